// Unicode "styled" text via Mathematical Alphanumeric Symbols (U+1D400 block).
// Only ASCII Latin letters and digits are mapped; everything else passes through.

interface StyleTable {
  upper: number;
  lower: number;
  digit: number;
  /** Letters whose slot in the block is reserved and lives elsewhere */
  exceptions?: Record<string, number>;
}

const ITALIC: StyleTable = {
  upper: 0x1d434, // 𝐴
  lower: 0x1d44e, // 𝑎
  digit: 0x1d7e2, // 𝟢 (sans-serif; there are no italic digits)
  exceptions: { h: 0x210e }, // ℎ Planck constant
};

const BOLD_ITALIC: StyleTable = {
  upper: 0x1d468, // 𝑨
  lower: 0x1d482, // 𝒂
  digit: 0x1d7ce, // 𝟎 (bold)
};

function styleChar(char: string, table: StyleTable): string {
  const exception = table.exceptions?.[char];
  if (exception !== undefined) {
    return String.fromCodePoint(exception);
  }

  const code = char.charCodeAt(0);
  if (code >= 0x41 && code <= 0x5a) {
    return String.fromCodePoint(table.upper + code - 0x41);
  }
  if (code >= 0x61 && code <= 0x7a) {
    return String.fromCodePoint(table.lower + code - 0x61);
  }
  if (code >= 0x30 && code <= 0x39) {
    return String.fromCodePoint(table.digit + code - 0x30);
  }
  return char;
}

function applyStyle(text: string, table: StyleTable): string {
  // Iterate by code point so astral characters pass through intact
  return Array.from(text, (char) => styleChar(char, table)).join("");
}

export function toItalic(text: string): string {
  return applyStyle(text, ITALIC);
}

export function toBoldItalic(text: string): string {
  return applyStyle(text, BOLD_ITALIC);
}
