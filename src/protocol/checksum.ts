/** 1-byte wrapping sum of `bytes[start..end)`. */
export function checksum(bytes: ArrayLike<number>, start = 0, end = bytes.length): number {
  let sum = 0;
  for (let i = start; i < end; i++) {
    sum = (sum + bytes[i]) & 0xff;
  }
  return sum;
}
