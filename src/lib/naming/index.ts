/**
 * Name Registry - deterministic identifier allocation for one generation run
 *
 * A registry is created per run (and per aggregate / enumeration for member
 * names); nothing is shared between runs.
 */

import type { NamingStyle } from '../../types/config.js';
import { NameExhaustionError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { canonicalize, differentiate, naturalnessScore } from './identifiers.js';

export * from './identifiers.js';
export { loadCSharpKeywords } from './reserved-words.js';

const MAX_NUMERIC_SUFFIX = 10_000;

export interface NameRegistryOptions {
  style: NamingStyle;
  reservedWords: Iterable<string>;
  fallback?: string;
}

export interface DifferentiatedName {
  raw: string;
  /** Position of `raw` in the group passed in */
  index: number;
  name: string;
}

export interface CollisionResolution {
  canonicalName: string;
  /** Raw name that keeps the canonical identifier; absent when it was already taken */
  keeper?: string;
  keeperIndex?: number;
  others: DifferentiatedName[];
}

export class NameRegistry {
  private readonly style: NamingStyle;
  private readonly reservedWords: ReadonlySet<string>;
  private readonly fallback: string;
  // canonical name → raw names that produced it, in allocation order
  private readonly allocations = new Map<string, string[]>();

  constructor(options: NameRegistryOptions) {
    this.style = options.style;
    this.reservedWords = new Set(options.reservedWords);
    this.fallback = options.fallback ?? 'UnknownType';
  }

  canonicalize(raw: string): string {
    return canonicalize(raw, {
      style: this.style,
      reservedWords: this.reservedWords,
      fallback: this.fallback,
    });
  }

  isUsed(name: string): boolean {
    return this.allocations.has(name);
  }

  reserve(name: string, raw: string = name): void {
    const origins = this.allocations.get(name);
    if (origins) {
      origins.push(raw);
    } else {
      this.allocations.set(name, [raw]);
    }
  }

  /**
   * Reserve `preferred`, or the first free numeric variant of it
   */
  claim(preferred: string): string {
    if (!this.isUsed(preferred)) {
      this.reserve(preferred);
      return preferred;
    }

    for (let suffix = 2; suffix <= MAX_NUMERIC_SUFFIX; suffix++) {
      const candidate = `${preferred}${suffix}`;
      if (!this.isUsed(candidate)) {
        this.reserve(candidate, preferred);
        return candidate;
      }
    }
    throw new NameExhaustionError(`No free identifier for "${preferred}"`, { preferred });
  }

  /**
   * Decide which raw name of a colliding group keeps the canonical identifier and
   * give every other member a differentiated one.
   */
  resolveCollision(
    group: readonly string[],
    canonicalName: string = this.canonicalize(group[0] ?? ''),
  ): CollisionResolution {
    const keeperAllowed = !this.isUsed(canonicalName);
    return this.resolveGroup(canonicalName, group, keeperAllowed);
  }

  /**
   * Allocate one identifier per raw name, in input order.
   *
   * Raw names are grouped by canonical form in order of first appearance. Every
   * free canonical form is reserved before any differentiation so a
   * differentiated name never takes another group's canonical identifier.
   */
  allocate(
    raws: readonly string[],
    toCanonical: (raw: string) => string = (raw) => this.canonicalize(raw),
  ): string[] {
    const groups = new Map<string, number[]>();
    raws.forEach((raw, index) => {
      const canonicalName = toCanonical(raw);
      const members = groups.get(canonicalName);
      if (members) {
        members.push(index);
      } else {
        groups.set(canonicalName, [index]);
      }
    });

    const free = new Set<string>();
    for (const [canonicalName, indices] of groups) {
      if (!this.isUsed(canonicalName)) {
        free.add(canonicalName);
        this.allocations.set(canonicalName, []);
      }
      if (indices.length > 1) {
        logger.debug('Name collision detected', {
          canonicalName,
          rawNames: indices.map((index) => raws[index]),
        });
      }
    }

    const names: string[] = new Array<string>(raws.length);
    for (const [canonicalName, indices] of groups) {
      const group = indices.map((index) => raws[index] ?? '');
      const resolution = this.resolveGroup(canonicalName, group, free.has(canonicalName));

      if (resolution.keeperIndex !== undefined) {
        const keeperPosition = indices[resolution.keeperIndex];
        if (keeperPosition !== undefined) {
          names[keeperPosition] = canonicalName;
        }
      }
      for (const other of resolution.others) {
        const position = indices[other.index];
        if (position !== undefined) {
          names[position] = other.name;
        }
      }
    }

    return names;
  }

  /**
   * Canonical name → originating raw names, for inspection and tests
   */
  entries(): ReadonlyMap<string, readonly string[]> {
    return this.allocations;
  }

  private resolveGroup(
    canonicalName: string,
    group: readonly string[],
    keeperAllowed: boolean,
  ): CollisionResolution {
    let keeperIndex: number | undefined;

    if (keeperAllowed) {
      let bestScore = Number.POSITIVE_INFINITY;
      group.forEach((raw, index) => {
        const score = naturalnessScore(raw, canonicalName);
        if (score < bestScore) {
          bestScore = score;
          keeperIndex = index;
        }
      });
    }

    const keeper = keeperIndex !== undefined ? group[keeperIndex] : undefined;
    if (keeper !== undefined) {
      const origins = this.allocations.get(canonicalName);
      if (origins) {
        origins.push(keeper);
      } else {
        this.allocations.set(canonicalName, [keeper]);
      }
    }

    const others: DifferentiatedName[] = [];
    group.forEach((raw, index) => {
      if (index === keeperIndex) {
        return;
      }

      const name = differentiate(
        raw,
        canonicalName,
        (candidate) => this.isUsed(candidate),
        (expanded) => this.canonicalize(expanded),
        MAX_NUMERIC_SUFFIX,
      );
      if (name === undefined) {
        throw new NameExhaustionError(`No free identifier for "${raw}"`, { raw, canonicalName });
      }

      this.reserve(name, raw);
      others.push({ raw, index, name });
    });

    if (others.length > 0) {
      logger.debug('Resolved name collision', {
        canonicalName,
        keeper,
        differentiated: others.map(({ raw, name }) => ({ raw, name })),
      });
    }

    return { canonicalName, keeper, keeperIndex, others };
  }
}

export function createNameRegistry(options: NameRegistryOptions): NameRegistry {
  return new NameRegistry(options);
}
