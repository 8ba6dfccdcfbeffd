import { ZeroAddress, dataSlice, getAddress, id } from 'ethers';

export { ZeroAddress };

/** Checksummed address derived from a readable label (last 20 bytes of its keccak256) */
export function labelAddress(label: string): string {
  return getAddress(dataSlice(id(label), 12));
}
