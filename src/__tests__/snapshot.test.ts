import { describe, it, expect } from 'vitest';
import {
  decodeRegister,
  decodeSnapshot,
  decodeWorld,
  encodeRegister,
  encodeSnapshot,
  encodeWorld,
} from '../ecs/snapshot';
import { addSystem, createWorld, spawn } from '../ecs/world';
import { REGISTRY_ERROR, RegistryError } from '../core/errors';
import { unwrap, type Register, type World } from '../types';

function buildState(): { world: World; register: Register } {
  const outcome = unwrap(spawn(createWorld('alpha'), undefined, ['X', 'Y']));
  if (!outcome.register) throw new Error('expected a register');
  return { world: addSystem(outcome.world, 6n, 'physics'), register: outcome.register };
}

describe('encode', () => {
  it('writes bitmaps as hex and maps as entry arrays', () => {
    const { world, register } = buildState();

    expect(encodeWorld(world)).toEqual({
      name: 'alpha',
      nextEntityId: 1,
      entities: [[1, { bitmask: '0x6', components: ['X', 'Y'] }]],
      systems: [['0x6', 'physics']],
    });
    expect(encodeRegister(register)).toEqual({
      nextBit: 2,
      addresses: ['X', 'Y'],
      bitToAddress: [[1, 'X'], [2, 'Y']],
    });
  });

  it('marks absent singletons as null', () => {
    expect(encodeSnapshot({ genesis: false, world: undefined, register: undefined })).toEqual({
      version: 1,
      genesis: false,
      world: null,
      register: null,
    });
  });
});

describe('decode', () => {
  it('restores the aggregates from a JSON round trip', () => {
    const { world, register } = buildState();
    const document: unknown = JSON.parse(JSON.stringify(encodeSnapshot({ genesis: true, world, register })));

    const state = decodeSnapshot(document);

    expect(state.genesis).toBe(true);
    expect(state.world).toEqual(world);
    expect(state.register).toEqual(register);
  });

  it('rejects unknown versions', () => {
    expect(() => decodeSnapshot({ version: 2, genesis: false, world: null, register: null }))
      .toThrow('Invalid snapshot: unsupported version 2');
  });

  it('rejects a genesis flag without a world', () => {
    expect(() => decodeSnapshot({ version: 1, genesis: true, world: null, register: null }))
      .toThrow('Invalid snapshot: genesis flag and world presence disagree');
  });

  it('rejects masks wider than the configured bitmap', () => {
    const world = {
      name: 'alpha',
      nextEntityId: 1,
      entities: [[1, { bitmask: '0x10', components: ['X'] }]],
      systems: [],
    };

    expect(() => decodeWorld(world, 4)).toThrow('Invalid snapshot: entity 1 bitmask 0x10 exceeds 4 bits');
    expect(decodeWorld(world).entities.get(1)?.bitmask).toBe(16n);
  });

  it('rejects masks that are not hex strings', () => {
    const world = {
      name: 'alpha',
      nextEntityId: 1,
      entities: [[1, { bitmask: 6, components: ['X'] }]],
      systems: [],
    };

    expect(() => decodeWorld(world)).toThrow('Invalid snapshot: entity 1 bitmask must be a 0x-prefixed hex string');
  });

  it('rejects entity ids the counter has not reached', () => {
    const world = {
      name: 'alpha',
      nextEntityId: 1,
      entities: [[2, { bitmask: '0x2', components: ['X'] }]],
      systems: [],
    };

    expect(() => decodeWorld(world)).toThrow('Invalid snapshot: entity id 2 must be between 1 and 1');
  });

  it('rejects audit entries past the register counter', () => {
    const register = { nextBit: 1, addresses: ['X'], bitToAddress: [[2, 'X']] };

    expect(() => decodeRegister(register)).toThrow('Invalid snapshot: bit index 2 must be between 1 and 1');
  });

  it('rejects a register counter at or past the width', () => {
    const register = { nextBit: 4, addresses: [], bitToAddress: [] };

    expect(() => decodeRegister(register, 4)).toThrow('Invalid snapshot: register.nextBit must be an integer below 4');
  });

  it('rejects an address listed twice in the register', () => {
    const register = { nextBit: 2, addresses: ['X', 'X'], bitToAddress: [[1, 'X'], [2, 'X']] };

    expect(() => decodeRegister(register)).toThrow('Invalid snapshot: register address X is listed twice');
  });

  it('rejects a registered address with no audit entry', () => {
    const register = { nextBit: 1, addresses: ['X', 'Y'], bitToAddress: [[1, 'X']] };

    expect(() => decodeRegister(register)).toThrow('Invalid snapshot: register address Y has no bit in bitToAddress');
  });

  it('accepts a re-registered address that owns several audit entries', () => {
    const register = { nextBit: 2, addresses: ['X'], bitToAddress: [[1, 'X'], [2, 'X']] };

    expect(decodeRegister(register).addresses).toEqual(['X']);
  });

  it('throws RegistryError with the INVALID_SNAPSHOT code', () => {
    try {
      decodeSnapshot('not a snapshot');
      throw new Error('expected decode to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(RegistryError);
      if (!(error instanceof RegistryError)) return;
      expect(error.code).toBe(REGISTRY_ERROR.INVALID_SNAPSHOT);
      expect(error.message).toBe('Invalid snapshot: document must be an object');
    }
  });
});
