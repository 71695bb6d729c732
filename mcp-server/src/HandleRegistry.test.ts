import { describe, it, expect } from 'vitest';
import type { LocalResource } from './DocumentStorage';
import { HandleRegistry } from './HandleRegistry';

function resource(name: string): LocalResource {
  return { kind: 'local', canonicalKey: `file:///work/${name}`, path: `/work/${name}`, displayPath: name };
}

function clock(...isoTimes: string[]): () => Date {
  let i = 0;
  return () => new Date(isoTimes[Math.min(i++, isoTimes.length - 1)]);
}

describe('HandleRegistry', () => {
  it('returns the existing handle for the same resource', () => {
    const registry = new HandleRegistry(
      clock('2026-01-01T00:00:00.000Z', '2026-01-01T00:05:00.000Z'),
    );
    const first = registry.register(resource('a.hwpx'));
    const second = registry.register(resource('a.hwpx'));

    expect(first.created).toBe(true);
    expect(first.handle.handleId).toMatch(/^h_[0-9a-f]{16}$/);
    expect(second.created).toBe(false);
    expect(second.handle.handleId).toBe(first.handle.handleId);
    expect(second.handle.registeredAt).toBe('2026-01-01T00:00:00.000Z');
    expect(second.handle.lastAccessedAt).toBe('2026-01-01T00:05:00.000Z');
    expect(registry.size).toBe(1);
  });

  it('fails HANDLE_NOT_FOUND after close', () => {
    const registry = new HandleRegistry();
    const { handle } = registry.register(resource('a.hwpx'));

    expect(registry.close(handle.handleId)).toBe(true);
    expect(registry.close(handle.handleId)).toBe(false);
    expect(() => registry.lookup(handle.handleId)).toThrow(
      expect.objectContaining({
        code: 'HANDLE_NOT_FOUND',
        message: `Handle not found: ${handle.handleId}`,
        details: { handleId: handle.handleId },
      }),
    );
    expect(registry.findByKey('file:///work/a.hwpx')).toBeUndefined();
  });

  it('gives a closed resource a fresh handle', () => {
    const registry = new HandleRegistry();
    const first = registry.register(resource('a.hwpx')).handle;
    registry.close(first.handleId);
    const second = registry.register(resource('a.hwpx'));

    expect(second.created).toBe(true);
    expect(second.handle.handleId).not.toBe(first.handleId);
  });

  it('notifies close listeners, including on clear', () => {
    const registry = new HandleRegistry();
    const closed: string[] = [];
    registry.onClose((handle) => closed.push(handle.resource.canonicalKey));
    registry.register(resource('a.hwpx'));
    registry.register(resource('b.hwpx'));

    registry.clear();

    expect(closed).toEqual(['file:///work/a.hwpx', 'file:///work/b.hwpx']);
    expect(registry.size).toBe(0);
  });

  it('lists copies in registration order', () => {
    const registry = new HandleRegistry();
    registry.register(resource('b.hwpx'));
    registry.register(resource('a.hwpx'));

    const listed = registry.list();
    expect(listed.map((h) => h.resource.canonicalKey)).toEqual(['file:///work/b.hwpx', 'file:///work/a.hwpx']);
    listed[0].lastAccessedAt = 'changed';
    expect(registry.list()[0].lastAccessedAt).not.toBe('changed');
  });
});
