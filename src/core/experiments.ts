export const EXPERIMENTS = {
  groupedSecurityUpdatesDisabled: "grouped_security_updates_disabled",
} as const;

export type ExperimentName = (typeof EXPERIMENTS)[keyof typeof EXPERIMENTS];

// Unknown flags are carried through so newer job payloads do not fail validation.
export class Experiments {
  private readonly flags: ReadonlyMap<string, boolean>;

  constructor(flags: Record<string, boolean> = {}) {
    this.flags = new Map(Object.entries(flags).map(([name, value]) => [normalize(name), value]));
  }

  enabled(name: ExperimentName | string): boolean {
    return this.flags.get(normalize(name)) === true;
  }

  toJSON(): Record<string, boolean> {
    return Object.fromEntries(this.flags);
  }
}

function normalize(name: string): string {
  return name.trim().toLowerCase().replace(/-/g, "_");
}
