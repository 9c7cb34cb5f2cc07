/**
 * Canonical delta checks run before strict serialization.
 *
 * Only two shapes break the serializer's line model: a text op that carries
 * its own newline, and a text op that carries a block attribute (which would
 * be silently dropped). Both are reported here.
 */

import { BLOCK_ATTRIBUTE_KEYS, NEWLINE, opsOf, type BlockAttributeKey, type DeltaLike } from './delta-types.js';

export type CanonicalInvariant = 'embedded-newline' | 'block-attribute-on-text';

export interface CanonicalIssue {
  invariant: CanonicalInvariant;
  opIndex: number;
  attribute?: BlockAttributeKey;
  message: string;
}

export class CanonicalViolation extends Error {
  readonly invariant: CanonicalInvariant;
  readonly opIndex: number;
  readonly attribute?: BlockAttributeKey;

  constructor(issue: CanonicalIssue) {
    super(issue.message);
    this.name = 'CanonicalViolation';
    this.invariant = issue.invariant;
    this.opIndex = issue.opIndex;
    this.attribute = issue.attribute;
  }
}

export function findCanonicalViolations(delta: DeltaLike | null | undefined): CanonicalIssue[] {
  const ops = opsOf(delta);
  if (!ops) return [];

  const issues: CanonicalIssue[] = [];
  ops.forEach((op, opIndex) => {
    // embeds are opaque
    if (!op || typeof op.insert !== 'string' || op.insert === NEWLINE) return;

    if (op.insert.includes(NEWLINE)) {
      issues.push({
        invariant: 'embedded-newline',
        opIndex,
        message: `Non-canonical delta: text op ${opIndex} contains an embedded \\n`,
      });
    }

    const attrs = op.attributes;
    if (!attrs || typeof attrs !== 'object') return;
    for (const key of BLOCK_ATTRIBUTE_KEYS) {
      if (key in attrs) {
        issues.push({
          invariant: 'block-attribute-on-text',
          opIndex,
          attribute: key,
          message: `Non-canonical delta: block attr "${key}" found on text op ${opIndex}`,
        });
      }
    }
  });
  return issues;
}

/** Throw a `CanonicalViolation` for the first broken invariant. */
export function assertCanonicalDelta(delta: DeltaLike | null | undefined): void {
  const [first] = findCanonicalViolations(delta);
  if (first) throw new CanonicalViolation(first);
}
