export type FaultTag = "OUT_OF_RANGE" | "UNREACHABLE";

export class RulesFault extends Error {
  readonly tag: FaultTag;

  constructor(tag: FaultTag, message: string) {
    super(message);
    this.name = "RulesFault";
    this.tag = tag;
  }
}

export const assertNever = (value: never): never => {
  throw new RulesFault("UNREACHABLE", `Unexpected value: ${String(value)}`);
};

export const invariant: (condition: boolean, tag: FaultTag, message: string) => asserts condition = (
  condition,
  tag,
  message,
) => {
  if (!condition) {
    throw new RulesFault(tag, message);
  }
};
