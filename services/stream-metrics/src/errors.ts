export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigError";
  }
}

// Raised when a counter refuses a delta (negative or not finite).
export class CounterUpdateError extends Error {
  constructor(
    readonly label: string,
    readonly index: number,
    readonly value: number
  ) {
    super(`${label}: counter #${index} rejected delta ${value}`);
    this.name = "CounterUpdateError";
  }
}
