import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { envSchemaWithRefinements } from './env.schema';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      validate: (config) => envSchemaWithRefinements.parse(config),
    }),
  ],
  exports: [ConfigModule],
})
export class CoreModule {}
