/** Shared constants for magic numbers used across the backend. */

/** Default address of the node-graph inference backend. */
export const DEFAULT_COMFY_BASE_URL = 'http://127.0.0.1:8188';

/** Name of the node whose outputs are collected as the generated images. */
export const OUTPUT_NODE_NAME = 'SaveImage';

/** Filename prefix handed to the output node. */
export const OUTPUT_FILENAME_PREFIX = 'Inference';

/** Upper bound for a best-effort interrupt request, in milliseconds. */
export const INTERRUPT_TIMEOUT_MS = 5_000;

/** Timeout for plain backend HTTP requests (history, object info), in milliseconds. */
export const REQUEST_TIMEOUT_MS = 30_000;

/** Timeout for fetching one extension manifest, in milliseconds. */
export const MANIFEST_TIMEOUT_MS = 30_000;

/** Largest seed handed out when the seed is randomized. */
export const MAX_RANDOM_SEED = 0xffff_ffff;

/** Manifest listing the custom nodes installable into a ComfyUI package. */
export const COMFY_EXTENSION_MANIFEST_URL =
  'https://cdn.jsdelivr.net/gh/ltdrdata/ComfyUI-Manager/custom-node-list.json';

/** Directory (relative to a ComfyUI install) holding custom node extensions. */
export const COMFY_EXTENSIONS_DIR = 'custom_nodes';

/** Finished generation records are dropped after this many milliseconds. */
export const GENERATION_RETENTION_MS = 600_000;
