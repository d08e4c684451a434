/**
 * Multi-signer helpers
 *
 * Off-chain side of owner-approved executions: the digest every signer
 * signs, and the packing of collected signatures into the single blob an
 * on-chain verifier walks in signer order. Collecting and verifying
 * signatures happens elsewhere.
 */

import { concatHex, getAddress, keccak256, size, toHex, type Address, type Hex } from "viem";

export interface ExecutionRequest {
  readonly account: Address;
  readonly to: Address;
  readonly value: bigint;
  readonly data: Hex;
  readonly nonce: bigint;
}

export interface SignerSignature {
  readonly signer: Address;
  /** 65-byte r ‖ s ‖ v signature */
  readonly signature: Hex;
}

const SIGNATURE_SIZE = 65;

/**
 * keccak256(0x19 ‖ 0x00 ‖ account ‖ to ‖ uint256(value) ‖ data ‖ uint256(nonce))
 */
export function computeExecutionDigest(request: ExecutionRequest): Hex {
  return keccak256(
    concatHex([
      "0x19",
      "0x00",
      getAddress(request.account),
      getAddress(request.to),
      toHex(request.value, { size: 32 }),
      request.data,
      toHex(request.nonce, { size: 32 }),
    ]),
  );
}

/**
 * Concatenate signatures ordered by signer address, ascending. A signer
 * may appear once.
 */
export function aggregateSignatures(signatures: readonly SignerSignature[]): Hex {
  const sorted = [...signatures].sort((a, b) => {
    const left = BigInt(a.signer);
    const right = BigInt(b.signer);
    return left < right ? -1 : left > right ? 1 : 0;
  });

  for (let i = 0; i < sorted.length; i++) {
    const { signer, signature } = sorted[i];
    if (size(signature) !== SIGNATURE_SIZE) {
      throw new Error(`Signature of ${getAddress(signer)} is ${size(signature)} bytes, expected ${SIGNATURE_SIZE}`);
    }
    if (i > 0 && BigInt(sorted[i - 1].signer) === BigInt(signer)) {
      throw new Error(`Duplicate signature from ${getAddress(signer)}`);
    }
  }

  return concatHex(sorted.map((s) => s.signature));
}
