/** Events broadcast to UI clients over /ws/events. */

import type { GenerationStatus, ImageSource } from './generation.js';

export type InferenceEvent =
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
  | { type: 'generation_failed'; generation_id: string; message: string };

export type ModificationEvent =
  | { type: 'modification_started'; runner_id: string; package_id: string; total_steps: number }
  | { type: 'modification_progress'; runner_id: string; step_index: number; title: string; message: string; progress: number | null }
  | { type: 'modification_step_failed'; runner_id: string; step_index: number; title: string; error: string }
  | { type: 'modification_completed'; runner_id: string; failed: boolean; completed_steps: number; total_steps: number };

export type ConnectionEvent =
  | { type: 'inference_connected'; address: string }
  | { type: 'inference_disconnected' };

export type WSEvent = InferenceEvent | ModificationEvent | ConnectionEvent;

export type SendEvent = (event: WSEvent) => void;
