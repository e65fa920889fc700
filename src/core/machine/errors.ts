export class InvalidSpecError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(issues.length === 1 ? `Invalid machine spec: ${issues[0]}` : `Invalid machine spec:\n- ${issues.join("\n- ")}`);
    this.name = "InvalidSpec";
    this.issues = issues;
  }
}

function formatValue(value: unknown): string {
  return typeof value === "string" ? JSON.stringify(value) : String(value);
}

export class InvalidInputError extends Error {
  readonly value: unknown;
  readonly index: number | null;

  constructor(value: unknown, index: number | null = null) {
    const where = index === null ? "" : ` at position ${index}`;
    super(`Invalid input${where}: ${formatValue(value)} (expected 0 or 1)`);
    this.name = "InvalidInput";
    this.value = value;
    this.index = index;
  }
}
