import type { NativePath, SessionRef, Surface, SurfaceId } from './types';

/**
 * Per-patient arena of Surface entities.
 *
 * Each surface is allocated exactly once; the native Field and the calendar
 * TreatmentSession both hold the instance stored here. Ids are dense indices in
 * allocation order, which is also native discovery order.
 */
export class EntityRegistry {
  private readonly surfaces: Surface[] = [];
  private readonly sessionRefs = new Map<SurfaceId, SessionRef>();

  constructor(readonly patientId: string) {}

  /**
   * Hands the next id to `factory` and stores what it returns. If the factory
   * throws, no id is consumed.
   */
  allocate<T extends { surface: Surface }>(factory: (id: SurfaceId) => T): T {
    const id = this.surfaces.length;
    const result = factory(id);
    if (result.surface.id !== id) {
      throw new Error(`Surface factory returned id ${result.surface.id}, expected ${id}`);
    }
    if (result.surface.owner.patientId !== this.patientId) {
      throw new Error(`Surface ${result.surface.path} belongs to patient ${result.surface.owner.patientId}, not ${this.patientId}`);
    }
    this.surfaces.push(result.surface);
    return result;
  }

  get(id: SurfaceId): Surface | undefined {
    return this.surfaces[id];
  }

  /** True only for the very instance allocated here, never an equal-looking copy. */
  has(surface: Surface): boolean {
    return this.surfaces[surface.id] === surface;
  }

  get size(): number {
    return this.surfaces.length;
  }

  [Symbol.iterator](): IterableIterator<Surface> {
    return this.surfaces[Symbol.iterator]();
  }

  fieldPathOf(id: SurfaceId): Readonly<NativePath> | undefined {
    return this.surfaces[id]?.owner;
  }

  attachSessionRef(surface: Surface, ref: SessionRef): void {
    if (!this.has(surface)) {
      throw new Error(`Surface ${surface.path} is not registered for patient ${this.patientId}`);
    }
    this.sessionRefs.set(surface.id, { ...ref });
  }

  sessionRefOf(id: SurfaceId): SessionRef | undefined {
    return this.sessionRefs.get(id);
  }

  clearSessionRefs(): void {
    this.sessionRefs.clear();
  }
}
