import { useEffect } from 'react';

interface Props {
  notification: { title: string; message: string } | null;
  onDismiss: () => void;
}

export const DISMISS_AFTER_MS = 8000;

export default function NotificationToast({ notification, onDismiss }: Props) {
  useEffect(() => {
    if (!notification) return;
    const timer = setTimeout(onDismiss, DISMISS_AFTER_MS);
    return () => clearTimeout(timer);
  }, [notification, onDismiss]);

  if (!notification) return null;

  return (
    <div
      className="fixed right-4 top-16 w-80 bg-slate-900 border border-slate-700 border-l-2 border-l-amber-400 rounded-xl shadow-lg p-4 z-50"
      role="alert"
    >
      <div className="flex items-start justify-between">
        <p className="text-sm font-semibold text-slate-100">{notification.title}</p>
        <button
          onClick={onDismiss}
          className="text-slate-400 hover:text-slate-100 ml-2 transition-colors"
          aria-label="Dismiss notification"
        >
          x
        </button>
      </div>
      <p className="text-xs text-slate-300 mt-1">{notification.message}</p>
    </div>
  );
}
