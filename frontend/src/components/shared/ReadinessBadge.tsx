import type { HealthState } from '../../hooks/useHealthCheck';

interface ReadinessBadgeProps {
  health: HealthState;
  loading: boolean;
}

function buildTooltip(health: HealthState): string {
  if (health.status === 'offline') {
    return 'Backend not reachable';
  }
  if (health.status === 'ready') {
    return `Connected to ${health.address ?? 'inference backend'}`;
  }
  return `Inference backend not connected${health.address ? ` (${health.address})` : ''}`;
}

export default function ReadinessBadge({ health, loading }: ReadinessBadgeProps) {
  if (loading) {
    return (
      <span className="text-xs px-2 py-1 rounded bg-slate-700 text-slate-300">
        Checking...
      </span>
    );
  }

  if (health.status === 'ready') {
    return (
      <span
        className="text-xs px-2 py-1 rounded bg-green-900/60 text-green-300"
        title={buildTooltip(health)}
      >
        Ready
      </span>
    );
  }

  if (health.status === 'offline') {
    return (
      <span
        className="text-xs px-2 py-1 rounded bg-red-900/60 text-red-300"
        title={buildTooltip(health)}
      >
        Offline
      </span>
    );
  }

  // degraded
  return (
    <span
      className="text-xs px-2 py-1 rounded bg-yellow-900/60 text-yellow-300"
      title={buildTooltip(health)}
    >
      Not Connected
    </span>
  );
}
