export type RecurrenceConfig =
  | { kind: "interval"; everyMs: number }
  | { kind: "daily"; times: string[] };

export interface RecurrenceProvider {
  lookupRecurrence: (queueId: string, taskType: string) => Promise<RecurrenceConfig | undefined>;
}

const UNIT_MS = {
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
} as const;

const UNIT_NAMES = [
  { ms: UNIT_MS.d, singular: "day", plural: "days" },
  { ms: UNIT_MS.h, singular: "hour", plural: "hours" },
  { ms: UNIT_MS.m, singular: "minute", plural: "minutes" },
  { ms: UNIT_MS.s, singular: "second", plural: "seconds" },
] as const;

const isUnit = (value: string): value is keyof typeof UNIT_MS =>
  Object.prototype.hasOwnProperty.call(UNIT_MS, value);

const parseInterval = ({ value }: { value: unknown }): number | null => {
  if (typeof value !== "string") {
    return null;
  }
  const match = value.trim().match(/^(\d+)\s*([smhd])$/);
  if (!match) {
    return null;
  }
  const [, amountRaw, unit] = match;
  const amount = Number(amountRaw);
  if (!Number.isInteger(amount) || amount <= 0 || !unit || !isUnit(unit)) {
    return null;
  }
  return amount * UNIT_MS[unit];
};

const parseDailyTime = ({ value }: { value: unknown }): string | null => {
  if (typeof value !== "string") {
    return null;
  }
  const match = value.trim().match(/^(\d{1,2}):(\d{2})$/);
  if (!match) {
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    return null;
  }
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
};

export const parseRecurrence = ({ value }: { value: unknown }): RecurrenceConfig | null => {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    return null;
  }
  const raw = value as { every?: unknown; daily?: unknown };
  if (raw.every !== undefined && raw.daily !== undefined) {
    return null;
  }
  if (raw.every !== undefined) {
    const everyMs = parseInterval({ value: raw.every });
    return everyMs === null ? null : { kind: "interval", everyMs };
  }
  if (raw.daily !== undefined) {
    const entries = Array.isArray(raw.daily) ? raw.daily : [raw.daily];
    const times = entries.map((entry) => parseDailyTime({ value: entry }));
    if (times.length === 0 || times.some((time) => time === null)) {
      return null;
    }
    const unique = Array.from(new Set(times.filter((time): time is string => time !== null)));
    return { kind: "daily", times: unique.sort() };
  }
  return null;
};

const describeInterval = ({ everyMs }: { everyMs: number }): string => {
  const unit = UNIT_NAMES.find((candidate) => everyMs % candidate.ms === 0);
  if (!unit) {
    return `Runs every ${everyMs} milliseconds.`;
  }
  const amount = everyMs / unit.ms;
  return amount === 1 ? `Runs every ${unit.singular}.` : `Runs every ${amount} ${unit.plural}.`;
};

export const describeRecurrence = ({ config }: { config: RecurrenceConfig }): string => {
  switch (config.kind) {
    case "interval":
      return describeInterval({ everyMs: config.everyMs });
    case "daily":
      return `Runs daily at ${config.times.join(", ")}.`;
  }
};
