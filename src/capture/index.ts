export { TaskController, createTaskController, DEFAULT_PROFILE_DIR } from './task-controller'
export type { TaskControllerEvents, TaskControllerOptions } from './task-controller'
export { ArtifactRecorder, FALLBACK_SCREENSHOT_NAME } from './artifact-recorder'
export type { ArtifactRecorderOptions, ExtractedArtifacts } from './artifact-recorder'
export { calculateCost, estimateCost, normalizeUsage, addUsage, emptyUsage, DEFAULT_PRICING } from './cost'
export { writeManifest, readManifest, buildManifest, ManifestSchema, MANIFEST_FILENAME } from './manifest-writer'
export type { Manifest } from './manifest-writer'
