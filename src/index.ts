export * from './curve/constants.js';
export { cube, cubeRoot, MAX_CUBE, CUBE_ROOT_ITERATIONS } from './curve/FixedPoint.js';
export { CurvePricer } from './curve/CurvePricer.js';
export { TradeSizer } from './curve/TradeSizer.js';
export type { BuyQuote, SellQuote, UnitsForReserve } from './curve/TradeSizer.js';
export { BondingCurve } from './curve/BondingCurve.js';
export type { BondingCurveOptions, BuyReceipt, SellReceipt, DetailedCurveState } from './curve/BondingCurve.js';
export { CurvePhase } from './curve/CurveState.js';
export type { CurveState, TradingCurveState, GraduatedCurveState, GraduationSplit } from './curve/CurveState.js';
export { GraduationHandler, splitGraduationReserve } from './curve/GraduationHandler.js';
export type { GraduationReceipt } from './curve/GraduationHandler.js';
export { CurveError, isCurveError } from './curve/CurveError.js';
export type { CurveErrorCode, CurveErrorCategory } from './curve/CurveError.js';
export { ReentrancyGuard } from './curve/ReentrancyGuard.js';
export { TokenLedger, InMemoryLedgerStore } from './token/TokenLedger.js';
export type { LedgerStore, LedgerEntry, Transaction } from './token/TokenLedger.js';
export { ReserveBank } from './token/ReserveBank.js';
export type { ReceiveHook, ReceiveContext } from './token/ReserveBank.js';
export { LedgerError } from './token/LedgerError.js';
export { Treasury } from './token/Treasury.js';
export type { TreasuryStats } from './token/Treasury.js';
export { EventHub } from './events/EventHub.js';
export type * from './events/types.js';
export { DeferredLiquiditySeeder } from './liquidity/LiquiditySeeder.js';
export type { LiquiditySeeder, LiquiditySeedRequest } from './liquidity/LiquiditySeeder.js';
export { LaunchFactory } from './launch/LaunchFactory.js';
export type { Launch, LaunchRequest, LaunchFactoryOptions, TokenMetadata, PlatformStats } from './launch/LaunchFactory.js';
export { loadConfig, resolveConfig, DEFAULT_CONFIG } from './config/index.js';
export type { LaunchpadConfig } from './config/index.js';
export { createLogger } from './utils/logger.js';
export { parseAmount, formatAmount } from './utils/units.js';
