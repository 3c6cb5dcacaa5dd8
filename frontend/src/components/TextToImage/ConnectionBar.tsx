import { useState } from 'react';

interface Props {
  connected: boolean;
  address: string | null;
  connecting: boolean;
  error: string | null;
  onConnect: (address?: string) => void;
  onDisconnect: () => void;
}

export default function ConnectionBar({ connected, address, connecting, error, onConnect, onDisconnect }: Props) {
  const [target, setTarget] = useState('');

  if (connected) {
    return (
      <div className="flex items-center gap-3 text-sm">
        <span className="text-green-300">Connected to {address}</span>
        <button
          onClick={onDisconnect}
          className="px-3 py-1 rounded-lg bg-slate-800 text-slate-200 hover:bg-slate-700"
        >
          Disconnect
        </button>
      </div>
    );
  }

  return (
    <div className="flex flex-col gap-1 text-sm">
      <div className="flex items-center gap-2">
        <input
          value={target}
          onChange={e => setTarget(e.target.value)}
          placeholder="Default address"
          aria-label="Backend address"
          className="px-2 py-1 rounded-lg bg-slate-800 border border-slate-700 text-slate-100 w-64"
        />
        <button
          onClick={() => onConnect(target.trim() || undefined)}
          disabled={connecting}
          className="px-3 py-1 rounded-lg bg-indigo-600 text-white hover:bg-indigo-500 disabled:opacity-50"
        >
          {connecting ? 'Connecting...' : 'Connect'}
        </button>
      </div>
      {error && <p className="text-xs text-red-300">{error}</p>}
    </div>
  );
}
