import { EntityRegistry } from '../entity-registry';
import type { Surface, SurfaceId } from '../types';

function makeSurface(id: SurfaceId, patientId = 'P001'): Surface {
  return {
    id,
    label: `Surface_${id}`,
    path: `/db/${patientId}/S/Ph/F/Surface_${id}`,
    owner: { patientId, siteId: 'S', phaseId: 'Ph', fieldId: 'F' },
    capturedAt: new Date(2024, 2, 12, 8, id, 0),
    endedAt: new Date(2024, 2, 12, 8, id, 30),
    recordings: [],
    captureDetails: {},
    siteDetails: {},
    flags: { suspect: false, outOfTolerance: null, missingTimestamp: false, beamOnSamples: 0, patientNotFoundSamples: 0 },
  };
}

describe('EntityRegistry', () => {
  it('hands out dense ids in allocation order', () => {
    const registry = new EntityRegistry('P001');

    const a = registry.allocate(id => ({ surface: makeSurface(id) }));
    const b = registry.allocate(id => ({ surface: makeSurface(id) }));

    expect([a.surface.id, b.surface.id]).toEqual([0, 1]);
    expect(registry.size).toBe(2);
    expect([...registry]).toEqual([a.surface, b.surface]);
    expect(registry.get(1)).toBe(b.surface);
    expect(registry.get(2)).toBeUndefined();
  });

  it('does not consume an id when the factory throws', () => {
    const registry = new EntityRegistry('P001');

    expect(() => registry.allocate(() => {
      throw new Error('corrupt');
    })).toThrow('corrupt');
    const next = registry.allocate(id => ({ surface: makeSurface(id) }));

    expect(next.surface.id).toBe(0);
    expect(registry.size).toBe(1);
  });

  it('rejects a factory that ignores the assigned id', () => {
    const registry = new EntityRegistry('P001');
    expect(() => registry.allocate(() => ({ surface: makeSurface(5) }))).toThrow('expected 0');
    expect(registry.size).toBe(0);
  });

  it('rejects a surface owned by another patient', () => {
    const registry = new EntityRegistry('P001');
    expect(() => registry.allocate(id => ({ surface: makeSurface(id, 'P002') }))).toThrow(/belongs to patient P002/);
  });

  it('recognises only the allocated instance', () => {
    const registry = new EntityRegistry('P001');
    const { surface } = registry.allocate(id => ({ surface: makeSurface(id) }));

    expect(registry.has(surface)).toBe(true);
    expect(registry.has({ ...surface })).toBe(false);
  });

  it('resolves the owning field path', () => {
    const registry = new EntityRegistry('P001');
    registry.allocate(id => ({ surface: makeSurface(id) }));

    expect(registry.fieldPathOf(0)).toEqual({ patientId: 'P001', siteId: 'S', phaseId: 'Ph', fieldId: 'F' });
    expect(registry.fieldPathOf(3)).toBeUndefined();
  });

  describe('session references', () => {
    it('stores and clears calendar back-references', () => {
      const registry = new EntityRegistry('P001');
      const { surface } = registry.allocate(id => ({ surface: makeSurface(id) }));

      registry.attachSessionRef(surface, { date: '2024-03-12', sessionIndex: 0 });
      expect(registry.sessionRefOf(0)).toEqual({ date: '2024-03-12', sessionIndex: 0 });

      registry.clearSessionRefs();
      expect(registry.sessionRefOf(0)).toBeUndefined();
    });

    it('refuses references for foreign surfaces', () => {
      const registry = new EntityRegistry('P001');
      registry.allocate(id => ({ surface: makeSurface(id) }));

      expect(() => registry.attachSessionRef(makeSurface(0), { date: '2024-03-12', sessionIndex: 0 }))
        .toThrow('not registered');
    });
  });
});
