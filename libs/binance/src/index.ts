export * from './binance.client';
export * from './binance.module';
export * from './retry.util';
