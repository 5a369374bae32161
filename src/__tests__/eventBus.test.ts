import { describe, it, expect, vi } from 'vitest';
import { EventBus, type RegistryEventMap } from '../core/eventBus';

describe('EventBus', () => {
  it('calls listener on emit', () => {
    const bus = new EventBus<RegistryEventMap>();
    const fn = vi.fn();
    bus.on('genesis', fn);
    bus.emit('genesis', { name: 'alpha' });
    expect(fn).toHaveBeenCalledWith({ name: 'alpha' });
  });

  it('supports multiple listeners', () => {
    const bus = new EventBus<RegistryEventMap>();
    const fn1 = vi.fn();
    const fn2 = vi.fn();
    bus.on('component_registered', fn1);
    bus.on('component_registered', fn2);
    bus.emit('component_registered', { address: 'X', bitIndex: 1, bit: 2n });
    expect(fn1).toHaveBeenCalledWith({ address: 'X', bitIndex: 1, bit: 2n });
    expect(fn2).toHaveBeenCalledWith({ address: 'X', bitIndex: 1, bit: 2n });
  });

  it('unsubscribes via returned function', () => {
    const bus = new EventBus<RegistryEventMap>();
    const fn = vi.fn();
    const unsub = bus.on('component_unregistered', fn);
    unsub();
    bus.emit('component_unregistered', { address: 'X' });
    expect(fn).not.toHaveBeenCalled();
  });

  it('once fires only once', () => {
    const bus = new EventBus<RegistryEventMap>();
    const fn = vi.fn();
    bus.once('entity_spawned', fn);
    bus.emit('entity_spawned', { entityId: 1, bitmask: 2n, components: ['X'] });
    bus.emit('entity_spawned', { entityId: 2, bitmask: 4n, components: ['Y'] });
    expect(fn).toHaveBeenCalledTimes(1);
    expect(fn).toHaveBeenCalledWith({ entityId: 1, bitmask: 2n, components: ['X'] });
  });

  it('delivers to every listener present when emit started', () => {
    const bus = new EventBus<RegistryEventMap>();
    const calls: string[] = [];
    const unsubSecond = bus.on('system_removed', () => calls.push('second'));
    bus.on('system_removed', () => calls.push('third'));
    bus.on('system_removed', () => {
      calls.push('first');
      unsubSecond();
    });

    bus.emit('system_removed', { query: 6n, handler: 'physics' });
    bus.emit('system_removed', { query: 6n, handler: 'physics' });

    expect(calls).toEqual(['second', 'third', 'first', 'third', 'first']);
  });

  it('off removes all listeners for event', () => {
    const bus = new EventBus<RegistryEventMap>();
    const fn = vi.fn();
    bus.on('genesis', fn);
    bus.off('genesis');
    bus.emit('genesis', { name: 'alpha' });
    expect(fn).not.toHaveBeenCalled();
  });

  it('clear removes all listeners', () => {
    const bus = new EventBus<RegistryEventMap>();
    const fn1 = vi.fn();
    const fn2 = vi.fn();
    bus.on('genesis', fn1);
    bus.on('system_added', fn2);
    bus.clear();
    bus.emit('genesis', { name: 'alpha' });
    bus.emit('system_added', { query: 2n, handler: 'mover', replaced: null });
    expect(fn1).not.toHaveBeenCalled();
    expect(fn2).not.toHaveBeenCalled();
  });

  it('logs a throwing listener and still calls the rest', () => {
    const bus = new EventBus<RegistryEventMap>();
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failure = new Error('listener broke');
    const after = vi.fn();
    bus.on('genesis', () => {
      throw failure;
    });
    bus.on('genesis', after);

    expect(() => bus.emit('genesis', { name: 'alpha' })).not.toThrow();
    expect(after).toHaveBeenCalledWith({ name: 'alpha' });
    expect(error).toHaveBeenCalledWith('[EventBus]', 'Listener for "genesis" failed:', failure);
  });

  it('emitting with no listeners is safe', () => {
    const bus = new EventBus<RegistryEventMap>();
    expect(() => bus.emit('genesis', { name: 'alpha' })).not.toThrow();
  });
});
