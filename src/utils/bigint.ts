/**
 * BigInt helpers shared by the fixed-point engine math
 */

export const minBigInt = (a: bigint, b: bigint): bigint => (a < b ? a : b);
