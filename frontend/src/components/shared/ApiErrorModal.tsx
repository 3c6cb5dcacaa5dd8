import { useState } from 'react';
import type { ApiErrorDetails } from '../../types';

interface Props {
  error: ApiErrorDetails;
  onClose: () => void;
}

/** Diagnostic dialog for a request the inference backend rejected. */
export default function ApiErrorModal({ error, onClose }: Props) {
  const [showDetails, setShowDetails] = useState(false);

  return (
    <div className="fixed inset-0 bg-black/60 z-50 flex items-center justify-center" role="dialog" aria-modal="true">
      <div className="bg-slate-900 border border-slate-700 rounded-xl shadow-2xl p-6 max-w-2xl mx-4 w-full">
        <h2 className="text-xl font-bold mb-3 text-red-300">{error.title}</h2>
        <p className="text-slate-300 text-sm mb-4">{error.message}</p>

        {error.details && (
          <>
            <button
              onClick={() => setShowDetails(!showDetails)}
              className="text-xs text-indigo-300 hover:text-indigo-200 underline mb-2"
            >
              {showDetails ? 'Hide details' : 'Show details'}
            </button>
            {showDetails && (
              <pre className="max-h-80 overflow-auto bg-slate-950 rounded-lg p-3 text-xs text-slate-300 mb-4 whitespace-pre-wrap">
                {error.details}
              </pre>
            )}
          </>
        )}

        <div className="flex justify-end">
          <button
            onClick={onClose}
            className="px-4 py-2 bg-indigo-600 text-white rounded-lg hover:bg-indigo-500 font-medium text-sm"
          >
            Close
          </button>
        </div>
      </div>
    </div>
  );
}
