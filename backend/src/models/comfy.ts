/** Node-graph request and response shapes exchanged with the inference backend. */

/** Reference to output slot `[1]` of the node named `[0]`. */
export type NodeRef = [nodeName: string, outputSlot: number];

export type NodeInputValue = string | number | boolean | null | NodeRef;

export interface ComfyNode {
  class_type: string;
  inputs: Record<string, NodeInputValue>;
}

/** A generation request: node name -> node. Names are unique by construction. */
export type NodeGraph = Record<string, ComfyNode>;

/** Reference to an image produced by an output node. */
export interface ComfyImage {
  filename: string;
  subfolder: string;
  type: string;
}

export interface ProgressUpdate {
  value: number;
  maximum: number;
  /** Name of the node currently executing, when the backend reported one. */
  runningNode: string | null;
}

export type PreviewImageFormat = 'jpeg' | 'png';

export interface PreviewImage {
  format: PreviewImageFormat;
  bytes: Buffer;
}

export interface QueuePromptResponse {
  prompt_id: string;
  number?: number;
  node_errors?: Record<string, unknown>;
}

export function isNodeRef(value: NodeInputValue): value is NodeRef {
  return Array.isArray(value);
}
