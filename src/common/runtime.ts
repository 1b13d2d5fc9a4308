/**
 * Host dependencies shared by the modules: logger and clock.
 * Injected so the pipeline can run against app.log and a fixed time in tests.
 */

export interface Logger {
  info(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  debug?(obj: Record<string, unknown>, msg?: string): void;
}

export interface Clock {
  utcNow(): Date;
}

export const systemClock: Clock = {
  utcNow: () => new Date(),
};

export const HOUR_MS = 60 * 60 * 1000;

export function hoursBefore(at: Date, hours: number): Date {
  return new Date(at.getTime() - hours * HOUR_MS);
}
