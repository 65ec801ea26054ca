export * from './core.module';
export * from './env.schema';
