export type MetadataResolutionErrorKind = "not_found" | "invalid";

export class MetadataResolutionError extends Error {
  readonly kind: MetadataResolutionErrorKind;
  readonly entry: string;

  constructor({
    kind,
    entry,
    reason,
  }: {
    kind: MetadataResolutionErrorKind;
    entry: string;
    reason: string;
  }) {
    super(`${entry}: ${reason}`);
    this.name = "MetadataResolutionError";
    this.kind = kind;
    this.entry = entry;
  }
}

export class UnknownRunCommandError extends Error {
  readonly commandId: string;

  constructor({ commandId }: { commandId: string }) {
    super(`Unknown run command: ${commandId}`);
    this.name = "UnknownRunCommandError";
    this.commandId = commandId;
  }
}
