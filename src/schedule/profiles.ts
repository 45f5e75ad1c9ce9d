import { ConfigError, UnknownTypeError } from "../common/errors";
import type { JsonScalar } from "../common/values";
import { TypeProfile } from "../types";

export const DEFAULT_SCHEDULE_KEY_PREFIX = "schedule";

export interface TypeProfileInput {
  modeFields: Record<string, JsonScalar>;
  scheduleKeyPrefix?: string;
}

/**
 * Immutable lookup from device type to the fields that put it into
 * schedule mode.
 */
export class TypeProfileRegistry {
  private readonly profiles: ReadonlyMap<string, TypeProfile>;

  constructor(types: Readonly<Record<string, TypeProfileInput>>) {
    const profiles = new Map<string, TypeProfile>();
    for (const [typeName, input] of Object.entries(types)) {
      if (Object.keys(input.modeFields).length === 0) {
        throw new ConfigError(`Type ${typeName} has no mode fields`);
      }
      profiles.set(
        typeName,
        Object.freeze({
          typeName,
          modeFields: Object.freeze({ ...input.modeFields }),
          scheduleKeyPrefix:
            input.scheduleKeyPrefix ?? DEFAULT_SCHEDULE_KEY_PREFIX,
        })
      );
    }
    this.profiles = profiles;
  }

  resolve(typeName: string): TypeProfile {
    const profile = this.profiles.get(typeName);
    if (!profile) {
      throw new UnknownTypeError(typeName);
    }
    return profile;
  }

  has(typeName: string): boolean {
    return this.profiles.has(typeName);
  }

  names(): string[] {
    return [...this.profiles.keys()];
  }
}
