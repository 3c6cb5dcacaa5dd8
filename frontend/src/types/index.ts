export interface SamplerParameters {
  name: string | null;
  steps: number;
  cfgScale: number;
  width: number;
  height: number;
}

export interface SeedParameters {
  value: number;
  randomize: boolean;
}

export interface PromptParameters {
  positive: string;
  negative: string;
}

export interface HiresFixParameters {
  enabled: boolean;
  upscaleMethod: string | null;
  scale: number;
  sampler: string | null;
  steps: number;
  denoise: number;
}

export interface GenerationParameters {
  model: string | null;
  sampler: SamplerParameters;
  seed: SeedParameters;
  batchSize: number;
  prompt: PromptParameters;
  hiresFix: HiresFixParameters;
}

export type ImageSourceKind = 'grid' | 'output';

export interface ImageSource {
  kind: ImageSourceKind;
  name: string;
  localPath?: string;
  url?: string;
}

export type GenerationStatus = 'running' | 'completed' | 'canceled' | 'failed';

export interface InferenceOptions {
  models: string[];
  samplers: string[];
  upscaleMethods: string[];
}

export interface InferenceStatus {
  connected: boolean;
  address: string | null;
  generation_id: string | null;
}

export interface HealthStatus {
  status: 'ready' | 'degraded';
  inference: 'connected' | 'disconnected';
  address: string | null;
}

export type ExtensionInstallType = 'git-clone' | 'copy' | 'unknown';

export interface PackageExtension {
  author: string;
  title: string;
  reference: string;
  files: string[];
  installType: ExtensionInstallType;
  description?: string;
  pipPackages?: string[];
}

export interface InstalledExtensionVersion {
  branch?: string;
  commitSha?: string;
}

export interface InstalledPackageExtension {
  paths: string[];
  gitRepositoryUrl?: string;
  version?: InstalledExtensionVersion;
  definition?: PackageExtension;
}

export interface InstalledPackage {
  id: string;
  displayName: string;
  packageName: string;
  libraryPath: string;
  supportsExtensions: boolean;
}

export interface PackageExtensions {
  available: PackageExtension[];
  installed: InstalledPackageExtension[];
}

export interface ModificationResult {
  runner_id: string;
  failed: boolean;
  completed_steps: number;
  errors: string[];
}

export interface ApiErrorDetails {
  title: string;
  message: string;
  details?: string;
}

export type WSEvent =
  | { type: 'notification'; title: string; message: string }
  | { type: 'generation_started'; generation_id: string }
  | { type: 'seed_changed'; generation_id: string; seed: number }
  | { type: 'generation_progress'; generation_id: string; value: number; maximum: number; text: string; is_indeterminate: boolean }
  | { type: 'generation_preview'; generation_id: string; format: 'jpeg' | 'png'; data: string }
  | { type: 'generation_preview_cleared'; generation_id: string }
  | { type: 'images_cleared'; generation_id: string }
  | { type: 'generation_images'; generation_id: string; images: ImageSource[] }
  | { type: 'api_error'; generation_id: string; title: string; message: string; details?: string }
  | { type: 'generation_finished'; generation_id: string; status: Exclude<GenerationStatus, 'running'> }
  | { type: 'generation_failed'; generation_id: string; message: string }
  | { type: 'modification_started'; runner_id: string; package_id: string; total_steps: number }
  | { type: 'modification_progress'; runner_id: string; step_index: number; title: string; message: string; progress: number | null }
  | { type: 'modification_step_failed'; runner_id: string; step_index: number; title: string; error: string }
  | { type: 'modification_completed'; runner_id: string; failed: boolean; completed_steps: number; total_steps: number }
  | { type: 'inference_connected'; address: string }
  | { type: 'inference_disconnected' }
  | { type: 'error'; message: string; recoverable: boolean };
