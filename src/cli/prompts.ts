export interface Prompter {
  ask(question: string): Promise<string>;
  print(line?: string): void;
}

export type ParseResult =
  | { ok: true; value: number }
  | { ok: false; message: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseQuantity(input: string): ParseResult {
  const trimmed = input.trim();
  if (!INTEGER_PATTERN.test(trimmed)) {
    return { ok: false, message: "Invalid quantity. Please enter a number." };
  }

  const value = Number(trimmed);
  if (!Number.isSafeInteger(value)) {
    return { ok: false, message: "Invalid quantity. Please enter a number." };
  }
  if (value <= 0) {
    return { ok: false, message: "Quantity must be positive." };
  }
  return { ok: true, value };
}

export function parsePrice(input: string): ParseResult {
  const trimmed = input.trim();
  const value = Number(trimmed);
  if (!DECIMAL_PATTERN.test(trimmed) || !Number.isFinite(value)) {
    return { ok: false, message: "Invalid price. Please enter a number." };
  }

  if (value < 0) {
    return { ok: false, message: "Price cannot be negative." };
  }
  return { ok: true, value };
}

export function printHeader(prompter: Prompter, text: string) {
  for (const line of headerLines(text)) {
    prompter.print(line);
  }
}

export function headerLines(text: string) {
  return ["", "=".repeat(60), text, "=".repeat(60)];
}
