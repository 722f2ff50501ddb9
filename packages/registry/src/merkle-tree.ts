/**
 * Merkle Tree.
 *
 * Binary hash tree shared by every level of the registry
 * (slots → rule, rules → standard, standards → global).
 *
 * Design:
 * - Internal nodes: SHA-256(left || right), concatenation of hex strings
 * - Odd count at any level: the last node is paired with itself
 * - Single leaf: leaf IS the root
 * - Empty tree: null root
 * - Levels are kept so the level above the leaves can be reported
 */

import { sha256 } from "./hashing.js";
import type { MerkleProof, MerkleProofStep } from "./types.js";

// =============================================================================
// Internal Helpers
// =============================================================================

export function hashPair(left: string, right: string): string {
  return sha256(left + right);
}

function nextLevel(level: readonly string[]): string[] {
  const parents: string[] = [];
  for (let i = 0; i < level.length; i += 2) {
    const left = level[i]!;
    const right = i + 1 < level.length ? level[i + 1]! : left;
    parents.push(hashPair(left, right));
  }
  return parents;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Immutable Merkle tree built from pre-hashed leaves.
 *
 * ```ts
 * const tree = MerkleTree.build(leaves);
 * tree.getRoot();           // root hash or null
 * tree.getProof(2);         // inclusion proof for leaf 2
 * MerkleTree.verifyProof(p) // true/false
 * ```
 */
export class MerkleTree {
  /** levels[0] are the leaves, the last level holds the root */
  private readonly levels: readonly (readonly string[])[];

  private constructor(leaves: readonly string[]) {
    const levels: string[][] = [[...leaves]];
    let current = levels[0]!;
    while (current.length > 1) {
      current = nextLevel(current);
      levels.push(current);
    }
    this.levels = levels;
  }

  static build(leaves: readonly string[]): MerkleTree {
    return new MerkleTree(leaves);
  }

  getRoot(): string | null {
    const top = this.levels[this.levels.length - 1]!;
    return top.length === 1 ? top[0]! : null;
  }

  getLeafCount(): number {
    return this.levels[0]!.length;
  }

  /**
   * Nodes at the given height (0 = leaves). Empty beyond the root.
   */
  getLevel(height: number): readonly string[] {
    return this.levels[height] ?? [];
  }

  /**
   * Inclusion proof for the leaf at `leafIndex`, or null when out of range.
   */
  getProof(leafIndex: number): MerkleProof | null {
    const root = this.getRoot();
    const leaves = this.levels[0]!;
    if (root === null || leafIndex < 0 || leafIndex >= leaves.length) {
      return null;
    }

    const siblings: MerkleProofStep[] = [];
    let index = leafIndex;

    for (let h = 0; h < this.levels.length - 1; h++) {
      const level = this.levels[h]!;
      const isLeft = index % 2 === 0;
      const siblingIndex = isLeft ? index + 1 : index - 1;

      // Last node of an odd level is its own sibling
      const sibling =
        siblingIndex < level.length ? level[siblingIndex]! : level[index]!;

      siblings.push({ hash: sibling, direction: isLeft ? "right" : "left" });
      index = Math.floor(index / 2);
    }

    return { leafHash: leaves[leafIndex]!, leafIndex, siblings, root };
  }

  /**
   * Check a proof without the tree.
   */
  static verifyProof(proof: MerkleProof): boolean {
    let current = proof.leafHash;
    for (const step of proof.siblings) {
      current =
        step.direction === "left"
          ? hashPair(step.hash, current)
          : hashPair(current, step.hash);
    }
    return current === proof.root;
  }
}
