import { pino, type BaseLogger } from "pino";
import { type LifecycleConfig, DEFAULT_LIFECYCLE_CONFIG } from "./config.js";
import { realSleep, type Sleep } from "./retry.js";
import type { LedgerStore } from "./storage/ledger-store.js";

export type Clock = () => Date;

export interface LifecycleContext {
  store: LedgerStore;
  config: LifecycleConfig;
  logger: BaseLogger;
  clock: Clock;
  sleep: Sleep;
}

export interface LifecycleContextOptions {
  store: LedgerStore;
  config?: LifecycleConfig;
  logger?: BaseLogger;
  clock?: Clock;
  sleep?: Sleep;
}

export function createContext(options: LifecycleContextOptions): LifecycleContext {
  return {
    store: options.store,
    config: options.config ?? DEFAULT_LIFECYCLE_CONFIG,
    logger: options.logger ?? pino({ name: "lifecycle", level: process.env.LOG_LEVEL || "info" }),
    clock: options.clock ?? (() => new Date()),
    sleep: options.sleep ?? realSleep,
  };
}
