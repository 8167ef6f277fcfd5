export * from './types';
export * from './errors';
export { NodeFileSystem, type DirectoryEntry, type FileSystemSource } from './filesystem';
export { RealTimeDeltasDecoder } from './realtime-deltas-decoder';
export { SurfaceRecordParser, type CaptureDecoder, type ParsedSurface } from './surface-parser';
export { EntityRegistry } from './entity-registry';
export { TreeHierarchyBuilder, type BuildResult } from './hierarchy-builder';
export { CalendarReprocessor, sessionTimeline, type ReprocessResult, type TimelinePoint } from './calendar-reprocessor';
export { Patient } from './patient';
export { PatientCollection, type AsyncLoadOptions, type PatientCollectionOptions, type PatientFilter } from './patient-collection';
