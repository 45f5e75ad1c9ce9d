/**
 * Error types shared by the scheduler, monitor and checker.
 *
 * Configuration-time problems (bad times, unknown types, invalid config)
 * are thrown. Problems with live device data are not errors: the tracker
 * and reconciler degrade to "absent" instead.
 */

export class ThermostatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ThermostatError";
  }
}

/**
 * Malformed time of day, schedule token or payload
 */
export class ParseError extends ThermostatError {
  constructor(message: string, readonly input?: string) {
    super(message);
    this.name = "ParseError";
  }
}

/**
 * A device references a type with no registered profile
 */
export class UnknownTypeError extends ThermostatError {
  constructor(readonly typeName: string) {
    super(`Unknown thermostat type: ${typeName}`);
    this.name = "UnknownTypeError";
  }
}

export class ConfigError extends ThermostatError {
  constructor(message: string, readonly issues: readonly string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "ConfigError";
  }
}

/**
 * No reply arrived within the collection window. Not fatal: the device is
 * reconciled as if it reported nothing.
 */
export class TransportTimeout extends ThermostatError {
  constructor(readonly device: string, readonly waitedMs: number) {
    super(`No reply for ${device} within ${waitedMs}ms`);
    this.name = "TransportTimeout";
  }
}

export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
