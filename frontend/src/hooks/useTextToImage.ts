import { useState, useCallback, useEffect, useRef } from 'react';
import type {
  ApiErrorDetails,
  GenerationParameters,
  GenerationStatus,
  ImageSource,
  InferenceOptions,
  WSEvent,
} from '../types';
import { inferenceApi } from '../lib/apiClient';
import { applyOptions, defaultParameters } from '../lib/generationParameters';

export interface GenerationProgress {
  value: number;
  maximum: number;
  text: string;
  isIndeterminate: boolean;
}

export interface Notification {
  title: string;
  message: string;
}

export const IDLE_PROGRESS: GenerationProgress = { value: 0, maximum: 0, text: '', isIndeterminate: false };

function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Text-to-image tab state: parameters edited locally, job state mirrored from backend events. */
export function useTextToImage(initialParameters?: GenerationParameters) {
  const [parameters, setParameters] = useState<GenerationParameters>(() => initialParameters ?? defaultParameters());
  const [generationId, setGenerationId] = useState<string | null>(null);
  const [lastStatus, setLastStatus] = useState<GenerationStatus | null>(null);
  const [progress, setProgress] = useState<GenerationProgress>(IDLE_PROGRESS);
  const [preview, setPreview] = useState<string | null>(null);
  const [images, setImages] = useState<ImageSource[]>([]);
  const [apiError, setApiError] = useState<ApiErrorDetails | null>(null);
  const [notification, setNotification] = useState<Notification | null>(null);
  const parametersRef = useRef(parameters);
  const generationIdRef = useRef<string | null>(null);
  // The finish event can arrive before the POST /generate response; ids are kept only while a request is pending
  const finishedRef = useRef(new Set<string>());
  const pendingRequestsRef = useRef(0);

  useEffect(() => { parametersRef.current = parameters; });

  const finish = useCallback((id: string, status: Exclude<GenerationStatus, 'running'>) => {
    if (pendingRequestsRef.current > 0) finishedRef.current.add(id);
    if (generationIdRef.current === id || generationIdRef.current === null) {
      generationIdRef.current = null;
      setGenerationId(null);
    }
    setLastStatus(status);
  }, []);

  const handleEvent = useCallback((event: WSEvent) => {
    switch (event.type) {
      case 'generation_started':
        generationIdRef.current = event.generation_id;
        setGenerationId(event.generation_id);
        setLastStatus('running');
        break;
      case 'seed_changed':
        setParameters(prev => ({ ...prev, seed: { ...prev.seed, value: event.seed } }));
        break;
      case 'generation_progress':
        setProgress({
          value: event.value,
          maximum: event.maximum,
          text: event.text,
          isIndeterminate: event.is_indeterminate,
        });
        break;
      case 'generation_preview':
        setPreview(`data:image/${event.format};base64,${event.data}`);
        break;
      case 'generation_preview_cleared':
        setPreview(null);
        break;
      case 'images_cleared':
        setImages([]);
        break;
      case 'generation_images':
        setImages(event.images);
        break;
      case 'api_error':
        setApiError({ title: event.title, message: event.message, details: event.details });
        break;
      case 'notification':
        setNotification({ title: event.title, message: event.message });
        break;
      case 'generation_finished':
        finish(event.generation_id, event.status);
        break;
      case 'generation_failed':
        finish(event.generation_id, 'failed');
        setNotification({ title: 'Generation failed', message: event.message });
        break;
      case 'error':
        setNotification({ title: 'Connection lost', message: event.message });
        break;
      default:
        break;
    }
  }, [finish]);

  const generate = useCallback(async () => {
    pendingRequestsRef.current += 1;
    try {
      const { generation_id } = await inferenceApi.generate(parametersRef.current);
      if (finishedRef.current.has(generation_id)) {
        finishedRef.current.delete(generation_id);
      } else {
        generationIdRef.current = generation_id;
        setGenerationId(generation_id);
      }
    } catch (err) {
      setNotification({ title: 'Generation failed', message: messageOf(err) });
    } finally {
      pendingRequestsRef.current -= 1;
      if (pendingRequestsRef.current === 0) finishedRef.current.clear();
    }
  }, []);

  const cancel = useCallback(async () => {
    const id = generationIdRef.current;
    if (!id) return;
    try {
      await inferenceApi.cancel(id);
    } catch (err) {
      setNotification({ title: 'Cancel failed', message: messageOf(err) });
    }
  }, []);

  const updateParameters = useCallback((update: (prev: GenerationParameters) => GenerationParameters) => {
    setParameters(update);
  }, []);

  const applyInferenceOptions = useCallback((options: InferenceOptions) => {
    setParameters(prev => applyOptions(prev, options));
  }, []);

  const dismissApiError = useCallback(() => setApiError(null), []);
  const dismissNotification = useCallback(() => setNotification(null), []);

  return {
    parameters,
    updateParameters,
    applyInferenceOptions,
    generationId,
    isGenerating: generationId !== null,
    lastStatus,
    progress,
    preview,
    images,
    apiError,
    notification,
    handleEvent,
    generate,
    cancel,
    dismissApiError,
    dismissNotification,
  };
}
