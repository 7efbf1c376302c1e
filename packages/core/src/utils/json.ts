export type JsonParseResult =
  | { ok: true; value: unknown }
  | {
      ok: false;
      message: string;
      line?: number;
      column?: number;
    };

const BYTE_ORDER_MARK = "\uFEFF";
const POSITION_PATTERN = /at position (\d+)/;
const LINE_COLUMN_PATTERN = /\(line (\d+) column (\d+)\)/;
const END_OF_INPUT_PATTERN = /end of (JSON )?input/i;

/**
 * Parses JSON text without throwing, locating syntax errors when the
 * parser reports where it stopped.
 */
export function parseJson(text: string): JsonParseResult {
  const source = text.startsWith(BYTE_ORDER_MARK) ? text.slice(1) : text;
  try {
    return { ok: true, value: JSON.parse(source) };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, message, ...locateJsonError(source, message) };
  }
}

/**
 * Derives a 1-based line/column from a JSON.parse error message.
 */
export function locateJsonError(
  text: string,
  message: string
): { line?: number; column?: number } {
  const lineColumn = LINE_COLUMN_PATTERN.exec(message);
  if (lineColumn) {
    return { line: Number(lineColumn[1]), column: Number(lineColumn[2]) };
  }

  const position = POSITION_PATTERN.exec(message);
  if (position) {
    return positionToLineColumn(text, Number(position[1]));
  }

  if (END_OF_INPUT_PATTERN.test(message)) {
    return positionToLineColumn(text, text.length);
  }

  return {};
}

export function positionToLineColumn(
  text: string,
  position: number
): { line: number; column: number } {
  const before = text.slice(0, Math.max(0, position));
  const lines = before.split(/\r\n|\r|\n/);
  const last = lines[lines.length - 1] ?? "";
  return { line: lines.length, column: last.length + 1 };
}

export function describeJsonType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  return typeof value;
}

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
