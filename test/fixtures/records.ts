/**
 * Record types shared by the mapping tests.
 */
import { defineRecord, t } from '../../src/mapping';
import type { NbtTag } from '../../src/tags';

export class Profile {
  id = 0n;
  tags: string[] = [];
}

export const ProfileType = defineRecord(Profile, {
  fields: [
    { key: 'id', type: t.int64(), name: 'id' },
    { key: 'tags', type: t.list(t.string()), name: 'tags', hideDefault: true },
  ],
});

export class Stats {
  level = 0;
  health = 0;
  flying = false;
}

export const StatsType = defineRecord(Stats, {
  fields: [
    { key: 'level', type: t.int32(), hideDefault: true },
    { key: 'health', type: t.float32(), name: 'hp', hideDefault: true },
    { key: 'flying', type: t.bool(), hideDefault: true },
  ],
});

export class Player {
  name = '';
  stats = new Stats();
  readonly inventory: string[] = [];
  internalNote = 'not mapped';
}

export const PlayerType = defineRecord(Player, {
  fields: [
    { key: 'name', type: t.string() },
    { key: 'stats', type: StatsType },
    { key: 'inventory', type: t.list(t.string()), readonly: true },
  ],
});

export class Scoreboard {
  scores = new Map<string, number>();
  title = '';
}

export const ScoreboardType = defineRecord(Scoreboard, {
  fields: [
    { key: 'scores', type: t.map(t.int32()), name: 'scores' },
    { key: 'title', type: t.string(), name: 'title' },
  ],
});

export class Entity {
  id = 0;
}

export const EntityType = defineRecord(Entity, {
  fields: [{ key: 'id', type: t.int32() }],
});

export class Monster extends Entity {
  kind = '';
}

export const MonsterType = defineRecord(Monster, {
  fields: [{ key: 'kind', type: t.string() }],
});

export class Settings {
  static version = 1;
  mode = '';
}

export const SettingsType = defineRecord(Settings, {
  fields: [
    { key: 'version', type: t.int32(), static: true },
    { key: 'mode', type: t.string() },
  ],
});

/** Cargo is exposed through a getter only, so it can only be filled in place. */
export class Ship {
  #cargo = new Map<string, number>();

  get cargo(): Map<string, number> {
    return this.#cargo;
  }
}

export const ShipType = defineRecord(Ship, {
  fields: [{ key: 'cargo', type: t.map(t.int32()) }],
});

export class Vault {
  #pin = 0;
  label = '';

  get pin(): number {
    return this.#pin;
  }

  static readPin(vault: Vault): number {
    return vault.#pin;
  }

  static writePin(vault: Vault, value: unknown): void {
    if (typeof value === 'number') vault.#pin = value;
  }
}

export const VaultType = defineRecord(Vault, {
  fields: [
    { key: 'label', type: t.string() },
    { key: 'pin', type: t.int32(), get: Vault.readPin, set: Vault.writePin },
  ],
});

export class Chain {
  label = '';
  next: Chain | null = null;
}

export const ChainType = defineRecord(Chain, {
  fields: [
    { key: 'label', type: t.string() },
    { key: 'next', type: t.record(Chain) },
  ],
});

export class Pixel {
  r = 0;
  g = 0;
  b = 0;
}

export const PixelType = defineRecord(Pixel, {
  fields: [
    { key: 'r', type: t.uint8() },
    { key: 'g', type: t.uint8() },
    { key: 'b', type: t.uint8() },
  ],
});

export class Envelope {
  extra: NbtTag | null = null;
  meta: Record<string, unknown> = {};
}

export const EnvelopeType = defineRecord(Envelope, {
  fields: [
    { key: 'extra', type: t.tag() },
    { key: 'meta', type: t.dict(t.dynamic()) },
  ],
});

export class Lookup {
  byId = new Map<number, string>();
}

export const LookupType = defineRecord(Lookup, {
  fields: [{ key: 'byId', type: t.map(t.string(), 'int32') }],
});

export class Frozen {
  readonly level: number = 5;
  readonly items: string[] | null = null;
  readonly score: number | null = null;
}

export const FrozenType = defineRecord(Frozen, {
  fields: [
    { key: 'level', type: t.int32(), readonly: true },
    { key: 'items', type: t.list(t.string()), readonly: true },
    { key: 'score', type: t.int32(), readonly: true },
  ],
});
