import type { BehaveTree } from '@mobforge/behavior';
import { compileBehavior } from '@mobforge/behavior';
import type { MobAsset } from './schema';
import type { MobResolution } from './resolver';
import { DEFAULT_MOB_ROOT, normalizeMobRef } from './naming';

/**
 * Read-only lookup over resolved mobs. Behaviors are compiled once at
 * build time; lookups accept file paths or normalized keys.
 */
export class MobRegistry {
  private constructor(
    private readonly mobs: Map<string, MobAsset>,
    private readonly behaviors: Map<string, BehaveTree>,
    private readonly root: string,
  ) {}

  static build(resolution: MobResolution, options: { root?: string } = {}): MobRegistry {
    const behaviors = new Map<string, BehaveTree>();
    for (const [key, mob] of resolution.mobs) {
      if (!mob.behavior) continue;
      const { tree, diagnostics } = compileBehavior(mob.behavior);
      for (const diagnostic of diagnostics) {
        console.warn(`[${key}] ${diagnostic.message}`);
      }
      behaviors.set(key, tree);
    }
    return new MobRegistry(new Map(resolution.mobs), behaviors, options.root ?? DEFAULT_MOB_ROOT);
  }

  get size(): number {
    return this.mobs.size;
  }

  getMob(ref: string): MobAsset | undefined {
    return this.mobs.get(normalizeMobRef(ref, this.root));
  }

  getBehavior(ref: string): BehaveTree | undefined {
    return this.behaviors.get(normalizeMobRef(ref, this.root));
  }

  contains(ref: string): boolean {
    return this.mobs.has(normalizeMobRef(ref, this.root));
  }

  keys(): string[] {
    return [...this.mobs.keys()].sort();
  }

  spawnableMobs(): string[] {
    return this.keys().filter(key => this.mobs.get(key)?.spawnable === true);
  }
}
