export type { Coin } from './coin.js';
export { CoinSchema, tossCoin, coinLabel } from './coin.js';
export type { CoinTossState, CoinTossDeps } from './machine.js';
export { CoinTossMachine, CoinTossStateSchema, COIN_TOSS_INITIAL_STATE, COINS_LANDED_DIFFERENTLY } from './machine.js';
