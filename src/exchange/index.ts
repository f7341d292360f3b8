export * from './types';
export { ClobExchange, ClobExchangeOptions } from './clob';
export { GammaClient, parseGammaMarket } from './gamma';
