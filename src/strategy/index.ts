/**
 * STRATEGY MODULE
 * ===============
 * Exports all strategy-related classes
 */

export { OcoCoordinator, oppositeSide } from './oco-coordinator';

export { TwapScheduler } from './twap-scheduler';
export type { TwapSchedulerConfig, TwapHooks, TwapStatus, TwapHandle, TaskHandle } from './twap-scheduler';

export { GridEngine } from './grid-engine';
export type {
  GridEngineConfig,
  GridHooks,
  GridStatus,
  GridStopResult,
  GridStopFailure,
  GridUpdateResult,
  GridHandle,
} from './grid-engine';

export { runHook } from './hooks';
