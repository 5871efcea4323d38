const UNITS = new Map<string, number>(Object.entries({
  zero: 0,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  sixteen: 16,
  seventeen: 17,
  eighteen: 18,
  nineteen: 19,
}));

/** Only valid as the whole phrase. */
const REPEATS = new Map<string, number>(Object.entries({ once: 1, twice: 2 }));

const TENS = new Map<string, number>(Object.entries({
  twenty: 20,
  thirty: 30,
  forty: 40,
  fifty: 50,
  sixty: 60,
  seventy: 70,
  eighty: 80,
  ninety: 90,
}));

const NEGATIVE = new Set(["minus", "negative"]);

/**
 * Reads an English cardinal ("five", "twenty-one", "three hundred sixty",
 * "minus one"). Returns null for anything else, including digits.
 */
export function parseWordNumber(text: string): number | null {
  const tokens = text
    .toLowerCase()
    .replace(/-/g, " ")
    .split(/\s+/)
    .filter((t) => t && t !== "and");
  if (tokens.length === 0) return null;

  let sign = 1;
  if (NEGATIVE.has(tokens[0])) {
    sign = -1;
    tokens.shift();
    if (tokens.length === 0) return null;
  }

  if (tokens.length === 1) {
    const repeat = REPEATS.get(tokens[0]);
    if (repeat !== undefined) return sign * repeat;
  }

  // Units and tens may not follow a unit, and tens may not follow tens:
  // "one one" and "five twenty" are not numbers.
  let total = 0;
  let current = 0;
  let previous: "unit" | "tens" | null = null;
  for (const token of tokens) {
    const unit = UNITS.get(token);
    const tens = TENS.get(token);
    if (unit !== undefined) {
      if (previous === "unit" || (previous === "tens" && (unit === 0 || unit >= 10))) return null;
      current += unit;
      previous = "unit";
    } else if (tens !== undefined) {
      if (previous !== null) return null;
      current += tens;
      previous = "tens";
    } else if (token === "hundred") {
      current = (current || 1) * 100;
      previous = null;
    } else if (token === "thousand") {
      total += (current || 1) * 1000;
      current = 0;
      previous = null;
    } else {
      return null;
    }
  }
  return sign * (total + current);
}
