/**
 * Mob definition schema.
 *
 * Every record is closed: an unknown key anywhere in a definition is a
 * definition error, so a typo never silently falls back to a default.
 */

import { z } from 'zod';
import type { DataValue } from '@mobforge/core';
import { parseBehaviorNode } from '@mobforge/behavior';
import { normalizeMobRef } from './naming';
import { definitionErrorFromZod } from './errors';

// ============================================================================
// Primitives
// ============================================================================

export const PHYSICS_LAYERS = [
  'Player',
  'AllyMob',
  'EnemyMob',
  'AllyProjectile',
  'EnemyProjectile',
  'AllyTentacle',
  'EnemyTentacle',
] as const;

export const PhysicsLayerSchema = z.enum(PHYSICS_LAYERS);
export type PhysicsLayer = z.infer<typeof PhysicsLayerSchema>;

export const Vec2Schema = z.tuple([z.number(), z.number()]);
export type Vec2 = z.infer<typeof Vec2Schema>;

const vec2 = (x: number, y: number) => Vec2Schema.default((): Vec2 => [x, y]);

const u8 = z.number().int().min(0).max(255);
const u32 = z.number().int().nonnegative();

// ============================================================================
// Physics
// ============================================================================

export const ColliderShapeSchema = z.union([
  z.object({ Rectangle: Vec2Schema }).strict(),
  z.object({ Circle: z.number() }).strict(),
  z.object({ Capsule: Vec2Schema }).strict(),
]);
export type ColliderShape = z.infer<typeof ColliderShapeSchema>;

export const ColliderSchema = z.object({
  shape: ColliderShapeSchema,
  position: vec2(0, 0),
  rotation: z.number().default(0),
}).strict();
export type Collider = z.infer<typeof ColliderSchema>;

// ============================================================================
// Spawners
// ============================================================================

export const MobSpawnerSchema = z.object({
  timer: z.number(),
  position: Vec2Schema,
  rotation: z.number(),
  mob_ref: z.string(),
}).strict();
export type MobSpawner = z.infer<typeof MobSpawnerSchema>;

export const ProjectileSpawnerSchema = z.object({
  timer: z.number(),
  position: Vec2Schema,
  rotation: z.number(),
  projectile_type: z.enum(['Bullet', 'Blast']),
  faction: z.enum(['Ally', 'Enemy']),
  speed_multiplier: z.number().default(1),
  damage_multiplier: z.number().default(1),
  range_seconds_multiplier: z.number().default(1),
  pre_spawn_animation_start_time: z.number().default(0.75),
  pre_spawn_animation_end_time: z.number().default(0.2),
}).strict();
export type ProjectileSpawner = z.infer<typeof ProjectileSpawnerSchema>;

export const MobSpawnersSchema = z.object({
  spawners: z.record(z.string(), MobSpawnerSchema),
}).strict();

export const ProjectileSpawnersSchema = z.object({
  spawners: z.record(z.string(), ProjectileSpawnerSchema),
}).strict();

// ============================================================================
// Joints
// ============================================================================

export const JointAngleLimitSchema = z.object({
  min: z.number(),
  max: z.number(),
  torque: z.number(),
}).strict();

export const RandomMobChainSchema = z.object({
  min_length: u8,
  end_chance: z.number(),
}).strict();

export const MobChainSchema = z.object({
  length: u8,
  pos_offset: Vec2Schema,
  anchor_offset: Vec2Schema,
  random_chain: RandomMobChainSchema.optional(),
}).strict();

export const JointedMobRefSchema = z.object({
  key: z.string(),
  mob_ref: z.string().transform(ref => normalizeMobRef(ref)),
  offset_pos: vec2(0, 0),
  anchor_1_pos: vec2(0, 0),
  anchor_2_pos: vec2(0, 0),
  angle_limit_range: JointAngleLimitSchema.optional(),
  compliance: z.number().default(0),
  chain: MobChainSchema.optional(),
}).strict();
export type JointedMobRef = z.infer<typeof JointedMobRefSchema>;

// ============================================================================
// Mob
// ============================================================================

export const MobAssetSchema = z.object({
  name: z.string(),
  spawnable: z.boolean().default(true),

  colliders: z.array(ColliderSchema).default((): Collider[] => [
    { shape: { Rectangle: [10, 10] }, position: [0, 0], rotation: 0 },
  ]),
  z_level: z.number().default(0),
  rotation_locked: z.boolean().default(true),
  max_linear_speed: vec2(20, 20),
  linear_acceleration: vec2(0.1, 0.1),
  linear_deceleration: vec2(0.3, 0.3),
  angular_acceleration: z.number().default(0.1),
  angular_deceleration: z.number().default(0.1),
  max_angular_speed: z.number().default(1),
  restitution: z.number().default(0.5),
  friction: z.number().default(0.5),
  collider_density: z.number().default(1),
  collision_layer_membership: z.array(PhysicsLayerSchema).default((): PhysicsLayer[] => ['EnemyMob']),
  collision_layer_filter: z.array(PhysicsLayerSchema).default((): PhysicsLayer[] => [
    'AllyMob',
    'AllyProjectile',
    'EnemyMob',
    'Player',
    'EnemyTentacle',
  ]),

  health: u32.default(50),
  targeting_range: z.number().optional(),
  projectile_speed: z.number().default(100),
  projectile_damage: u32.default(5),
  projectile_range_seconds: z.number().default(1),

  sprite: z.string().default(''),
  decorations: z.array(z.tuple([z.string(), Vec2Schema])).default(() => []),

  mob_spawners: MobSpawnersSchema.optional(),
  projectile_spawners: ProjectileSpawnersSchema.optional(),

  jointed_mobs: z.array(JointedMobRefSchema).default(() => []),

  behavior_transmitter: z.boolean().default(false),
  // Behavior trees are read leniently; unreadable nodes surface at compile time.
  behavior: z.unknown().transform(raw => parseBehaviorNode(raw)).optional(),
}).strict();

export type MobAsset = z.infer<typeof MobAssetSchema>;

export const MOB_ASSET_FIELDS: readonly string[] = Object.keys(MobAssetSchema.shape);

/** Deserialize a merged definition, throwing MobDefinitionError on the first problem. */
export function parseMobAsset(value: DataValue, entity: string): MobAsset {
  const result = MobAssetSchema.safeParse(value);
  if (!result.success) throw definitionErrorFromZod(entity, result.error);
  return result.data;
}

/** Patches may name any subset of the fields, and nothing else. No defaults are filled in. */
export const MobPatchSchema = MobAssetSchema.partial().strict();

export type MobPatch = z.infer<typeof MobPatchSchema>;

export function parseMobPatch(value: DataValue, entity: string): MobPatch {
  const result = MobPatchSchema.safeParse(value);
  if (!result.success) throw definitionErrorFromZod(entity, result.error);
  return result.data;
}
