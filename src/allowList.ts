// ============================================================================
// @phasemint/engine — Allow-List Proofs
// ============================================================================
//
// Leaves are keccak256 of the 20 address bytes, hashed once. Interior nodes
// hash the sorted pair, so proofs carry no left/right flags. Off-system
// tooling that builds roots must use exactly this scheme.
// ============================================================================

import { keccak_256 } from '@noble/hashes/sha3';
import { ethers } from 'ethers';
import { ConfigError } from './errors.js';
import type { Address, Bytes32 } from './types.js';

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

/**
 * Compute the allow-list leaf for an address.
 *
 * @returns 0x-prefixed bytes32 hex string.
 */
export function hashLeaf(address: Address): Bytes32 {
  return ethers.hexlify(keccak_256(ethers.getBytes(ethers.getAddress(address))));
}

/** Hash two nodes in ascending byte order. */
export function hashPair(a: Bytes32, b: Bytes32): Bytes32 {
  const [low, high] = a.toLowerCase() <= b.toLowerCase() ? [a, b] : [b, a];
  return ethers.hexlify(keccak_256(ethers.getBytes(ethers.concat([low, high]))));
}

/** Fold a proof onto a leaf and return the resulting root. */
export function processProof(proof: readonly Bytes32[], leaf: Bytes32): Bytes32 {
  let computed = leaf;
  for (const sibling of proof) {
    computed = hashPair(computed, sibling);
  }
  return computed;
}

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

/**
 * Check that `claimant` is committed to by `root`.
 *
 * Pure and side-effect free. Malformed input (a non-address claimant, a
 * sibling or root that is not 32 bytes) never verifies.
 */
export function verifyAllowList(
  proof: readonly Bytes32[],
  claimant: Address,
  root: Bytes32,
): boolean {
  if (!ethers.isAddress(claimant) || !ethers.isHexString(root, 32)) return false;
  if (!proof.every((sibling) => ethers.isHexString(sibling, 32))) return false;
  return processProof(proof, hashLeaf(claimant)).toLowerCase() === root.toLowerCase();
}

// ---------------------------------------------------------------------------
// AllowListTree: proof generation
// ---------------------------------------------------------------------------

/**
 * Merkle tree over a set of addresses, for producing roots and proofs that
 * {@link verifyAllowList} accepts.
 *
 * Leaves are sorted and de-duplicated. A node left without a partner at the
 * end of a layer moves up unchanged.
 *
 * @example
 * ```ts
 * const tree = AllowListTree.fromAddresses([alice, bob, carol]);
 * engine.addPhase(owner, { ..., allowListRoot: tree.root });
 * engine.whitelistMint({ caller: bob, value }, tree.getProof(bob), 1, phaseId);
 * ```
 */
export class AllowListTree {
  private readonly layers: Bytes32[][];

  private constructor(leaves: Bytes32[]) {
    this.layers = [leaves];
    let layer = leaves;
    while (layer.length > 1) {
      const next: Bytes32[] = [];
      for (let i = 0; i < layer.length; i += 2) {
        next.push(i + 1 < layer.length ? hashPair(layer[i], layer[i + 1]) : layer[i]);
      }
      this.layers.push(next);
      layer = next;
    }
  }

  /**
   * @throws {ConfigError} if the list is empty or holds an invalid address.
   */
  static fromAddresses(addresses: readonly string[]): AllowListTree {
    if (addresses.length === 0) {
      throw new ConfigError('InvalidConfig', 'allow-list must contain at least one address');
    }
    const leaves = new Set<Bytes32>();
    for (const address of addresses) {
      if (!ethers.isAddress(address)) {
        throw new ConfigError('InvalidAddress', `allow-list entry is not a valid address — got ${address}`);
      }
      leaves.add(hashLeaf(address));
    }
    return new AllowListTree([...leaves].sort());
  }

  get root(): Bytes32 {
    return this.layers[this.layers.length - 1][0];
  }

  get size(): number {
    return this.layers[0].length;
  }

  has(address: string): boolean {
    return ethers.isAddress(address) && this.layers[0].includes(hashLeaf(address));
  }

  /**
   * Sibling path from the address's leaf to the root.
   *
   * @throws {ConfigError} if the address is not in the tree.
   */
  getProof(address: string): Bytes32[] {
    let index = ethers.isAddress(address) ? this.layers[0].indexOf(hashLeaf(address)) : -1;
    if (index < 0) {
      throw new ConfigError('InvalidAddress', `${address} is not on the allow-list`);
    }
    const proof: Bytes32[] = [];
    for (let depth = 0; depth < this.layers.length - 1; depth++) {
      const layer = this.layers[depth];
      const sibling = index % 2 === 0 ? index + 1 : index - 1;
      if (sibling < layer.length) proof.push(layer[sibling]);
      index = Math.floor(index / 2);
    }
    return proof;
  }
}
