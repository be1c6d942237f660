/**
 * Identifier generation for new manifest entries
 */

import crypto from 'crypto';
import type { ProjectManifest } from './model.js';

/**
 * Produces candidate identifiers; may repeat, collisions are filtered out
 */
export type IdentifierSource = () => string;

export const IDENTIFIER_PATTERN = /^[0-9A-F]{24}$/;

/**
 * 24 uppercase hex characters from 12 random bytes
 */
export const randomIdentifierSource: IdentifierSource = () =>
  crypto.randomBytes(12).toString('hex').toUpperCase();

/**
 * Counter-based source, for reproducible output
 */
export function sequentialIdentifierSource(prefix: string = 'AA', start: number = 1): IdentifierSource {
  let counter = start;
  return () => {
    const digits = (counter++).toString(16).toUpperCase();
    return (prefix + digits.padStart(24 - prefix.length, '0')).slice(-24);
  };
}

const MAX_ATTEMPTS = 1000;

export class IdentifierGenerator {
  private readonly taken: Set<string>;
  private readonly source: IdentifierSource;

  constructor(taken: Iterable<string>, source: IdentifierSource = randomIdentifierSource) {
    this.taken = new Set(taken);
    this.source = source;
  }

  /**
   * Generator that avoids every identifier already present in the manifest
   */
  static forManifest(manifest: ProjectManifest, source?: IdentifierSource): IdentifierGenerator {
    return new IdentifierGenerator(manifest.identifiers(), source);
  }

  next(): string {
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      const candidate = this.source();
      if (!IDENTIFIER_PATTERN.test(candidate)) {
        throw new Error(`Identifier source produced an invalid identifier: ${candidate}`);
      }
      if (!this.taken.has(candidate)) {
        this.taken.add(candidate);
        return candidate;
      }
    }
    throw new Error(`No free identifier after ${MAX_ATTEMPTS} attempts`);
  }
}
