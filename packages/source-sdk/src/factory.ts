import type { AdapterDefinition, BoardTarget } from './types.js';

/**
 * Typed helper for adapter definitions.
 * Keeps platform declarations consistent without runtime overhead.
 */
export function defineAdapter<T extends AdapterDefinition>(adapter: T): T {
  return adapter;
}

/**
 * Registry key for one configured board: one adapter per (company, source).
 */
export function adapterKey(target: Pick<BoardTarget, 'company' | 'source'>): string {
  return `${target.company}:${target.source}`;
}
