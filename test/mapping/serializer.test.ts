import { describe, it, expect } from 'vitest';
import { serializeObject, t } from '../../src/mapping';
import { NbtMapperError } from '../../src/shared/types';
import {
  NbtByte,
  NbtCompound,
  NbtDouble,
  NbtFloat,
  NbtInt,
  NbtList,
  NbtLong,
  NbtShort,
  NbtString,
} from '../../src/tags';
import { captureError } from '../helpers';
import {
  Chain,
  Envelope,
  Lookup,
  Monster,
  Player,
  Profile,
  Scoreboard,
  Settings,
  Stats,
} from '../fixtures/records';

describe('serializeObject', () => {
  it('omits an empty sequence marked hideDefault', () => {
    const profile = new Profile();
    profile.id = 42n;

    const tag = serializeObject(profile);

    expect(tag.names()).toEqual(['id']);
    expect(tag.get('id')).toEqual(new NbtLong('id', 42n));
  });

  it('writes sequences as lists of unnamed children', () => {
    const profile = new Profile();
    profile.tags = ['red', 'blue'];

    const list = serializeObject(profile).get('tags');

    expect(list).toBeInstanceOf(NbtList);
    expect(list).toEqual(new NbtList('tags', [new NbtString(null, 'red'), new NbtString(null, 'blue')]));
  });

  it('uses the exported name instead of the member key', () => {
    const stats = new Stats();
    stats.health = 20;

    const tag = serializeObject(stats);

    expect(tag.has('hp')).toBe(true);
    expect(tag.has('health')).toBe(false);
    expect(tag.get('hp')).toEqual(new NbtFloat('hp', 20));
  });

  it('elides members holding their default value', () => {
    const stats = new Stats();
    stats.level = 3;
    stats.flying = false;

    expect(serializeObject(stats).names()).toEqual(['level']);
  });

  it('writes booleans as bytes', () => {
    const stats = new Stats();
    stats.flying = true;

    expect(serializeObject(stats).get('flying')).toEqual(new NbtByte('flying', 1));
  });

  it('drops nested records whose members all elide', () => {
    const player = new Player();
    player.name = 'Alex';

    const tag = serializeObject(player);

    expect(tag.names()).toEqual(['name']);
  });

  it('never writes unregistered members', () => {
    const player = new Player();
    player.name = 'Alex';
    player.internalNote = 'visible?';

    expect(serializeObject(player).has('internalNote')).toBe(false);
  });

  it('nests records as compounds', () => {
    const player = new Player();
    player.name = 'Alex';
    player.stats.level = 7;
    player.inventory.push('sword');

    const tag = serializeObject(player);

    expect(tag.names()).toEqual(['name', 'stats', 'inventory']);
    expect(tag.get('stats')).toEqual(new NbtCompound('stats', [new NbtInt('level', 7)]));
  });

  it('writes string-keyed maps as compounds in insertion order', () => {
    const board = new Scoreboard();
    board.scores.set('a', 1);
    board.scores.set('b', 2);

    const scores = serializeObject(board).get('scores');

    expect(scores).toEqual(new NbtCompound('scores', [new NbtInt('a', 1), new NbtInt('b', 2)]));
  });

  it('omits empty maps', () => {
    const board = new Scoreboard();
    board.title = 'weekly';

    expect(serializeObject(board).names()).toEqual(['title']);
  });

  it('omits maps with non-string keys', () => {
    const lookup = new Lookup();
    lookup.byId.set(1, 'one');

    expect(serializeObject(lookup).count).toBe(0);
  });

  it('includes inherited members before own members', () => {
    const monster = new Monster();
    monster.id = 7;
    monster.kind = 'orc';

    const tag = serializeObject(monster);

    expect(tag.names()).toEqual(['id', 'kind']);
  });

  it('reads static members from the class', () => {
    const settings = new Settings();
    settings.mode = 'fast';

    const tag = serializeObject(settings);

    expect(tag.names()).toEqual(['version', 'mode']);
    expect(tag.get('version')).toEqual(new NbtInt('version', Settings.version));
  });

  it('embeds pre-built tags under the member name without touching the original', () => {
    const envelope = new Envelope();
    const extra = new NbtCompound('original', [new NbtInt('x', 1)]);
    envelope.extra = extra;

    const tag = serializeObject(envelope);

    expect(tag.get('extra')).toEqual(new NbtCompound('extra', [new NbtInt('x', 1)]));
    expect(tag.get('extra')).not.toBe(extra);
    expect(extra.name).toBe('original');
  });

  it('infers kinds for dynamic values', () => {
    const envelope = new Envelope();
    envelope.meta = { count: 1, ratio: 2.5, big: 10n, on: true, label: 'x', list: [1, 2], empty: {} };

    const meta = serializeObject(envelope).get('meta');

    expect(meta).toEqual(
      new NbtCompound('meta', [
        new NbtInt('count', 1),
        new NbtDouble('ratio', 2.5),
        new NbtLong('big', 10n),
        new NbtByte('on', 1),
        new NbtString('label', 'x'),
        new NbtList('list', [new NbtInt(null, 1), new NbtInt(null, 2)]),
      ]),
    );
  });

  it('skips null list elements', () => {
    const envelope = new Envelope();
    envelope.meta = { values: [1, null, 2] };

    const meta = serializeObject(envelope).get('meta');

    expect(meta).toEqual(
      new NbtCompound('meta', [new NbtList('values', [new NbtInt(null, 1), new NbtInt(null, 2)])]),
    );
  });

  it('serializes plain objects as compounds', () => {
    const tag = serializeObject({ a: 1, b: 'two' });

    expect(tag).toEqual(new NbtCompound(null, [new NbtInt('a', 1), new NbtString('b', 'two')]));
  });

  it('accepts an explicit root type', () => {
    const tag = serializeObject(new Map([['a', 300]]), { type: t.map(t.int16()) });

    expect(tag.get('a')).toEqual(new NbtShort('a', 300));
  });

  it('returns an empty compound for a record with nothing to write', () => {
    const tag = serializeObject(new Stats());

    expect(tag).toEqual(new NbtCompound());
  });
});

describe('serializeObject failures', () => {
  it('rejects a null root', () => {
    const value: object = JSON.parse('null');
    const err = captureError(() => serializeObject(value));

    expect(err).toBeInstanceOf(NbtMapperError);
    expect(err).toMatchObject({ code: 'NBTMAP_E101' });
  });

  it('rejects a root that is not compound-shaped', () => {
    const err = captureError(() => serializeObject(new Uint8Array([1, 2])));

    expect(err).toMatchObject({ code: 'NBTMAP_E102' });
  });

  it('fails fast on circular references', () => {
    const chain = new Chain();
    chain.label = 'loop';
    chain.next = chain;

    const err = captureError(() => serializeObject(chain));

    expect(err).toMatchObject({ code: 'NBTMAP_E301', context: { path: 'root.next' } });
  });

  it('allows the same object twice on different branches', () => {
    const shared = new Chain();
    shared.label = 'leaf';
    const envelope = new Envelope();
    envelope.meta = { left: shared, right: shared };

    const meta = serializeObject(envelope).get('meta');

    expect(meta).toEqual(
      new NbtCompound('meta', [
        new NbtCompound('left', [new NbtString('label', 'leaf')]),
        new NbtCompound('right', [new NbtString('label', 'leaf')]),
      ]),
    );
  });

  it('enforces the maximum depth', () => {
    const a = new Chain();
    const b = new Chain();
    a.label = 'a';
    b.label = 'b';
    a.next = b;

    const err = captureError(() => serializeObject(a, { maxDepth: 1 }));

    expect(err).toMatchObject({ code: 'NBTMAP_E302', context: { path: 'root.next.label' } });
  });

  it('omits values that do not fit their declared kind by default', () => {
    const stats = new Stats();
    Reflect.set(stats, 'level', 'high');
    stats.flying = true;

    expect(serializeObject(stats).names()).toEqual(['flying']);
  });

  it('fails on unmappable values when asked to', () => {
    const stats = new Stats();
    Reflect.set(stats, 'level', 'high');

    const err = captureError(() => serializeObject(stats, { onUnmapped: 'error' }));

    expect(err).toMatchObject({ code: 'NBTMAP_E303', context: { path: 'root.level', type: 'int32' } });
  });

  it('omits numbers an integer member cannot hold', () => {
    const stats = new Stats();
    stats.level = 2 ** 40;
    stats.flying = true;

    expect(serializeObject(stats).names()).toEqual(['flying']);
  });

  it('fails on fractional integer members when asked to', () => {
    const stats = new Stats();
    stats.level = 3.7;

    const err = captureError(() => serializeObject(stats, { onUnmapped: 'error' }));

    expect(err).toMatchObject({ code: 'NBTMAP_E303', context: { path: 'root.level', type: 'int32' } });
  });
});
