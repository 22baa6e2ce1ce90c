/**
 * SEC-DED extended Hamming code sized to the word width.
 *
 * Stored codeword layout, MSB first: {parity, check[r-1:0], data[w-1:0]}.
 * Data bit j sits at Hamming position `data_positions[j]` (1-based, never a
 * power of two); check bit i covers every data bit whose position has bit i
 * set. The overall parity bit makes double errors detectable.
 */

export type EccLayout = {
  data_bits: number;
  /** Hamming check bits, excluding the overall parity bit */
  hamming_bits: number;
  check_bits: number;
  code_bits: number;
  data_positions: number[];
  coverage: number[][];
};

export type DecodedWord = {
  data: bigint;
  syndrome: number;
  correctable: boolean;
  uncorrectable: boolean;
};

export function hammingBits(width: number): number {
  let r = 1;
  while (2 ** r < width + r + 1) r += 1;
  return r;
}

export function eccCheckBits(width: number): number {
  return hammingBits(width) + 1;
}

function isPow2(n: number): boolean {
  return n > 0 && (n & (n - 1)) === 0;
}

export function eccLayout(width: number): EccLayout {
  const r = hammingBits(width);
  const dataPositions: number[] = [];
  for (let pos = 1; dataPositions.length < width; pos += 1) {
    if (!isPow2(pos)) dataPositions.push(pos);
  }
  const coverage: number[][] = [];
  for (let i = 0; i < r; i += 1) {
    coverage.push(dataPositions.flatMap((pos, j) => ((pos >> i) & 1 ? [j] : [])));
  }
  return {
    data_bits: width,
    hamming_bits: r,
    check_bits: r + 1,
    code_bits: width + r + 1,
    data_positions: dataPositions,
    coverage,
  };
}

function bit(v: bigint, i: number): number {
  return Number((v >> BigInt(i)) & 1n);
}

function mask(bits: number): bigint {
  return (1n << BigInt(bits)) - 1n;
}

function parity(v: bigint): number {
  let p = 0;
  for (let x = v; x > 0n; x >>= 1n) p ^= Number(x & 1n);
  return p;
}

function checkValue(layout: EccLayout, data: bigint): number {
  let check = 0;
  layout.coverage.forEach((bits, i) => {
    const p = bits.reduce((acc, j) => acc ^ bit(data, j), 0);
    check |= p << i;
  });
  return check;
}

export function encodeWord(layout: EccLayout, data: bigint): bigint {
  const d = data & mask(layout.data_bits);
  const body = d | (BigInt(checkValue(layout, d)) << BigInt(layout.data_bits));
  return body | (BigInt(parity(body)) << BigInt(layout.data_bits + layout.hamming_bits));
}

/** Same decision logic as the generated decoder: parity error ⇒ correctable, clean parity with a syndrome ⇒ uncorrectable. */
export function decodeWord(layout: EccLayout, code: bigint): DecodedWord {
  const word = code & mask(layout.code_bits);
  const data = word & mask(layout.data_bits);
  const stored = Number((word >> BigInt(layout.data_bits)) & mask(layout.hamming_bits));
  const syndrome = stored ^ checkValue(layout, data);
  const parityErr = parity(word) === 1;
  let corrected = data;
  if (parityErr) {
    const j = layout.data_positions.indexOf(syndrome);
    if (j >= 0) corrected ^= 1n << BigInt(j);
  }
  return {
    data: corrected,
    syndrome,
    correctable: parityErr,
    uncorrectable: !parityErr && syndrome !== 0,
  };
}
