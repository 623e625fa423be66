/**
 * Logarithm and exponential tables for GF(2^8)
 *
 * Field polynomial: x^8 + x^4 + x^3 + x + 1 (0x11b)
 * Generator: 0xe5
 *
 * The tables are built once when the module loads and frozen afterwards.
 */

export const FIELD_POLYNOMIAL = 0x11b;
export const GENERATOR = 0xe5;

/**
 * Carry-less multiply reduced by the field polynomial.
 * Only used while building the tables, on public values.
 */
function slowMultiply(a: number, b: number): number {
  let result = 0;
  while (b > 0) {
    if (b & 1) {
      result ^= a;
    }
    a <<= 1;
    if (a & 0x100) {
      a ^= FIELD_POLYNOMIAL;
    }
    b >>= 1;
  }
  return result;
}

function buildTables(): { exp: number[]; log: number[] } {
  const exp = new Array<number>(256).fill(0);
  const log = new Array<number>(256).fill(0);

  let x = 1;
  for (let i = 0; i < 255; i++) {
    exp[i] = x;
    log[x] = i;
    x = slowMultiply(x, GENERATOR);
  }

  // g^255 = g^0, so a log sum of exactly 255 needs no extra reduction
  exp[255] = exp[0];

  return { exp, log };
}

const tables = buildTables();

/** EXP_TABLE[i] = GENERATOR^i */
export const EXP_TABLE: readonly number[] = Object.freeze(tables.exp);

/** LOG_TABLE[a] = discrete log of a; entry 0 is unused */
export const LOG_TABLE: readonly number[] = Object.freeze(tables.log);
