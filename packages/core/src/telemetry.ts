/* eslint-disable no-console */

export type TelemetryEventData = Readonly<Record<string, unknown>>;

export interface TelemetryFacade {
  recordError(event: string, data?: TelemetryEventData): void;
  recordWarning(event: string, data?: TelemetryEventData): void;
  recordProgress(event: string, data?: TelemetryEventData): void;
  /**
   * A broken engine invariant (owner mismatch, runaway state machine). Kept
   * apart from `recordError` so hosts can alert on it separately.
   */
  recordInvariantViolation(event: string, data?: TelemetryEventData): void;
  recordCounters(group: string, counters: Readonly<Record<string, number>>): void;
  recordTick(): void;
}

export type TelemetryLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Readonly<Record<TelemetryLevel, number>> = Object.freeze({
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
});

export interface ConsoleTelemetryOptions {
  /**
   * Quietest level printed. Ticks log at `debug`, progress and counters at
   * `info`.
   *
   * @defaultValue `'debug'`
   */
  readonly minLevel?: TelemetryLevel;
}

/**
 * Discards every event. Installed until a host calls {@link setTelemetry}.
 */
export const silentTelemetry: TelemetryFacade = {
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordInvariantViolation() {},
  recordCounters() {},
  recordTick() {},
};

/**
 * Prints events to the console, one line prefix per severity.
 *
 * @example
 * import { setTelemetry, createConsoleTelemetry } from '@colonist/core';
 * setTelemetry(createConsoleTelemetry({ minLevel: 'warn' }));
 */
export function createConsoleTelemetry(options: ConsoleTelemetryOptions = {}): TelemetryFacade {
  const threshold = LEVEL_RANK[options.minLevel ?? 'debug'];
  const enabled = (level: TelemetryLevel): boolean => LEVEL_RANK[level] >= threshold;

  return {
    recordError(event, data) {
      console.error(`[telemetry:error] ${event}`, data);
    },
    recordWarning(event, data) {
      if (enabled('warn')) {
        console.warn(`[telemetry:warning] ${event}`, data);
      }
    },
    recordProgress(event, data) {
      if (enabled('info')) {
        console.info(`[telemetry:progress] ${event}`, data);
      }
    },
    recordInvariantViolation(event, data) {
      console.error(`[telemetry:invariant] ${event}`, data);
    },
    recordCounters(group, counters) {
      if (enabled('info')) {
        console.info(`[telemetry:counters] ${group}`, counters);
      }
    },
    recordTick() {
      if (enabled('debug')) {
        console.debug('[telemetry:tick]');
      }
    },
  };
}

let activeTelemetry: TelemetryFacade = silentTelemetry;

/**
 * Process-wide entry point the engine reports through. Calls are forwarded to
 * the installed facade; a facade that throws is logged and otherwise ignored.
 */
export const telemetry: TelemetryFacade = {
  recordError(event, data) {
    invokeSafely(activeTelemetry, 'recordError', event, data);
  },
  recordWarning(event, data) {
    invokeSafely(activeTelemetry, 'recordWarning', event, data);
  },
  recordProgress(event, data) {
    invokeSafely(activeTelemetry, 'recordProgress', event, data);
  },
  recordInvariantViolation(event, data) {
    invokeSafely(activeTelemetry, 'recordInvariantViolation', event, data);
  },
  recordCounters(group, counters) {
    invokeSafely(activeTelemetry, 'recordCounters', group, counters);
  },
  recordTick() {
    invokeSafely(activeTelemetry, 'recordTick');
  },
};

export function setTelemetry(facade: TelemetryFacade): void {
  activeTelemetry = facade;
}

export function resetTelemetry(): void {
  activeTelemetry = silentTelemetry;
}

function invokeSafely<TMethod extends keyof TelemetryFacade>(
  facade: TelemetryFacade,
  method: TMethod,
  ...args: Parameters<TelemetryFacade[TMethod]>
): void {
  try {
    (
      facade[method] as (
        ...fnArgs: Parameters<TelemetryFacade[TMethod]>
      ) => ReturnType<TelemetryFacade[TMethod]>
    ).call(facade, ...args);
  } catch (error) {
    console.error('[telemetry] invocation failed', error);
  }
}
