import { useState, useEffect } from 'react';
import type { ImageSource } from '../../types';
import type { GenerationProgress } from '../../hooks/useTextToImage';
import { imageUrl } from '../../lib/apiClient';

interface Props {
  images: ImageSource[];
  preview: string | null;
  progress: GenerationProgress;
}

export default function ImageGallery({ images, preview, progress }: Props) {
  const [selected, setSelected] = useState(0);

  useEffect(() => {
    setSelected(0); // eslint-disable-line react-hooks/set-state-in-effect
  }, [images]);

  const current = images[selected];
  const percent = progress.maximum > 0 ? Math.round((progress.value / progress.maximum) * 100) : 0;

  return (
    <div className="flex flex-col gap-3">
      <div className="relative aspect-square bg-slate-900 rounded-xl border border-slate-800 flex items-center justify-center overflow-hidden">
        {current && (
          <img src={imageUrl(current)} alt={current.name} className="max-w-full max-h-full object-contain" />
        )}
        {!current && !preview && <p className="text-slate-500 text-sm">No images yet</p>}
        {preview && (
          <img
            src={preview}
            alt="Preview"
            data-testid="preview-overlay"
            className="absolute inset-0 w-full h-full object-contain bg-slate-900/80"
          />
        )}
      </div>

      {(progress.maximum > 0 || progress.isIndeterminate) && (
        <div>
          <div
            role="progressbar"
            aria-valuenow={progress.value}
            aria-valuemax={progress.maximum}
            className="h-2 rounded-full bg-slate-800 overflow-hidden"
          >
            <div
              className={`h-full bg-indigo-500 ${progress.isIndeterminate ? 'animate-pulse w-full' : ''}`}
              style={progress.isIndeterminate ? undefined : { width: `${percent}%` }}
            />
          </div>
          <p className="text-xs text-slate-400 mt-1">{progress.text}</p>
        </div>
      )}

      {images.length > 1 && (
        <div className="flex gap-2 overflow-x-auto">
          {images.map((image, i) => (
            <button
              key={`${image.kind}:${image.name}`}
              onClick={() => setSelected(i)}
              aria-label={image.name}
              className={`shrink-0 w-16 h-16 rounded-lg overflow-hidden border ${
                i === selected ? 'border-indigo-400' : 'border-slate-700'
              }`}
            >
              <img src={imageUrl(image)} alt="" className="w-full h-full object-cover" />
            </button>
          ))}
        </div>
      )}
    </div>
  );
}
