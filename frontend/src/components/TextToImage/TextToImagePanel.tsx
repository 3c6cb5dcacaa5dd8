import type { ReactNode } from 'react';
import type { GenerationParameters, ImageSource, InferenceOptions } from '../../types';
import type { GenerationProgress } from '../../hooks/useTextToImage';
import ImageGallery from './ImageGallery';

interface Props {
  parameters: GenerationParameters;
  options: InferenceOptions;
  connected: boolean;
  isGenerating: boolean;
  progress: GenerationProgress;
  preview: string | null;
  images: ImageSource[];
  onChange: (update: (prev: GenerationParameters) => GenerationParameters) => void;
  onGenerate: () => void;
  onCancel: () => void;
}

const inputClass = 'w-full px-2 py-1 rounded-lg bg-slate-800 border border-slate-700 text-slate-100 text-sm';

function Field({ label, children }: { label: string; children: ReactNode }) {
  return (
    <div className="flex flex-col gap-1 text-xs text-slate-400">
      <span>{label}</span>
      {children}
    </div>
  );
}

function NumberInput({ label, value, step = 1, min, onChange }: {
  label: string;
  value: number;
  step?: number;
  min?: number;
  onChange: (value: number) => void;
}) {
  return (
    <Field label={label}>
      <input
        type="number"
        aria-label={label}
        value={value}
        step={step}
        min={min}
        onChange={e => {
          const parsed = Number(e.target.value);
          if (e.target.value !== '' && Number.isFinite(parsed)) onChange(parsed);
        }}
        className={inputClass}
      />
    </Field>
  );
}

function Choice({ label, value, choices, placeholder, onChange }: {
  label: string;
  value: string | null;
  choices: string[];
  placeholder: string;
  onChange: (value: string | null) => void;
}) {
  return (
    <Field label={label}>
      <select
        aria-label={label}
        value={value ?? ''}
        onChange={e => onChange(e.target.value === '' ? null : e.target.value)}
        className={inputClass}
      >
        <option value="">{placeholder}</option>
        {choices.map(choice => (
          <option key={choice} value={choice}>{choice}</option>
        ))}
      </select>
    </Field>
  );
}

export default function TextToImagePanel({
  parameters,
  options,
  connected,
  isGenerating,
  progress,
  preview,
  images,
  onChange,
  onGenerate,
  onCancel,
}: Props) {
  const { sampler, seed, prompt, hiresFix } = parameters;
  const setSampler = (patch: Partial<GenerationParameters['sampler']>) =>
    onChange(p => ({ ...p, sampler: { ...p.sampler, ...patch } }));
  const setHires = (patch: Partial<GenerationParameters['hiresFix']>) =>
    onChange(p => ({ ...p, hiresFix: { ...p.hiresFix, ...patch } }));

  return (
    <div className="grid grid-cols-[minmax(0,1fr)_minmax(0,1fr)] gap-6">
      <div className="flex flex-col gap-4">
        <Field label="Prompt">
          <textarea
            aria-label="Prompt"
            value={prompt.positive}
            onChange={e => onChange(p => ({ ...p, prompt: { ...p.prompt, positive: e.target.value } }))}
            className={`${inputClass} min-h-[96px]`}
          />
        </Field>
        <Field label="Negative prompt">
          <textarea
            aria-label="Negative prompt"
            value={prompt.negative}
            onChange={e => onChange(p => ({ ...p, prompt: { ...p.prompt, negative: e.target.value } }))}
            className={`${inputClass} min-h-[64px]`}
          />
        </Field>

        <div className="grid grid-cols-2 gap-3">
          <Choice
            label="Model"
            value={parameters.model}
            choices={options.models}
            placeholder="Select a model"
            onChange={model => onChange(p => ({ ...p, model }))}
          />
          <Choice
            label="Sampler"
            value={sampler.name}
            choices={options.samplers}
            placeholder="Select a sampler"
            onChange={name => setSampler({ name })}
          />
          <NumberInput label="Steps" value={sampler.steps} min={1} onChange={steps => setSampler({ steps })} />
          <NumberInput label="CFG scale" value={sampler.cfgScale} step={0.5} min={0} onChange={cfgScale => setSampler({ cfgScale })} />
          <NumberInput label="Width" value={sampler.width} step={64} min={64} onChange={width => setSampler({ width })} />
          <NumberInput label="Height" value={sampler.height} step={64} min={64} onChange={height => setSampler({ height })} />
          <NumberInput
            label="Seed"
            value={seed.value}
            min={0}
            onChange={value => onChange(p => ({ ...p, seed: { ...p.seed, value } }))}
          />
          <NumberInput
            label="Batch size"
            value={parameters.batchSize}
            min={1}
            onChange={batchSize => onChange(p => ({ ...p, batchSize }))}
          />
        </div>
        <label className="flex items-center gap-2 text-sm text-slate-300">
          <input
            type="checkbox"
            checked={seed.randomize}
            onChange={e => onChange(p => ({ ...p, seed: { ...p.seed, randomize: e.target.checked } }))}
          />
          Randomize seed
        </label>

        <fieldset className="border border-slate-800 rounded-xl p-3 flex flex-col gap-3">
          <legend className="px-1">
            <label className="flex items-center gap-2 text-sm text-slate-300">
              <input
                type="checkbox"
                checked={hiresFix.enabled}
                onChange={e => setHires({ enabled: e.target.checked })}
              />
              Hi-res fix
            </label>
          </legend>
          {hiresFix.enabled && (
            <div className="grid grid-cols-2 gap-3">
              <Choice
                label="Upscale method"
                value={hiresFix.upscaleMethod}
                choices={options.upscaleMethods}
                placeholder="Select a method"
                onChange={upscaleMethod => setHires({ upscaleMethod })}
              />
              <Choice
                label="Hi-res sampler"
                value={hiresFix.sampler}
                choices={options.samplers}
                placeholder="Same as first pass"
                onChange={hiresSampler => setHires({ sampler: hiresSampler })}
              />
              <NumberInput label="Scale" value={hiresFix.scale} step={0.25} min={1} onChange={scale => setHires({ scale })} />
              <NumberInput label="Hi-res steps" value={hiresFix.steps} min={1} onChange={steps => setHires({ steps })} />
              <NumberInput label="Denoise" value={hiresFix.denoise} step={0.05} min={0} onChange={denoise => setHires({ denoise })} />
            </div>
          )}
        </fieldset>

        <div className="flex gap-3">
          <button
            onClick={onGenerate}
            disabled={isGenerating}
            className="px-5 py-2 rounded-xl bg-indigo-600 text-white font-medium hover:bg-indigo-500 disabled:opacity-50"
          >
            Generate
          </button>
          {isGenerating && (
            <button
              onClick={onCancel}
              className="px-5 py-2 rounded-xl bg-slate-800 text-slate-200 font-medium hover:bg-slate-700"
            >
              Cancel
            </button>
          )}
          {!connected && <span className="self-center text-xs text-slate-500">Not connected</span>}
        </div>
      </div>

      <ImageGallery images={images} preview={preview} progress={progress} />
    </div>
  );
}
