import { Component } from 'react';
import type { ReactNode, ErrorInfo } from 'react';

interface Props {
  children: ReactNode;
  fallback?: ReactNode;
}

interface State {
  error: Error | null;
}

/** Catches render errors; running generations and extension steps continue on the backend. */
export default class ErrorBoundary extends Component<Props, State> {
  state: State = { error: null };

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error('ErrorBoundary caught:', error, info);
  }

  private reset = () => this.setState({ error: null });

  render() {
    const { error } = this.state;
    if (!error) return this.props.children;
    if (this.props.fallback) return this.props.fallback;

    return (
      <div className="fixed inset-0 flex items-center justify-center bg-slate-950">
        <div className="bg-slate-900 border border-slate-700 rounded-2xl shadow-2xl p-8 max-w-md mx-4 text-center">
          <h2 className="text-2xl font-bold mb-4 text-slate-100">Something went wrong</h2>
          <p className="text-slate-400 mb-2">{error.message || 'An unexpected error occurred.'}</p>
          <p className="text-xs text-slate-500 mb-6">
            Jobs already sent to the backend keep running and report back after a reload.
          </p>
          <div className="flex gap-3 justify-center">
            <button
              onClick={this.reset}
              className="px-5 py-2.5 rounded-xl text-sm font-medium bg-indigo-500/15 text-indigo-300 hover:bg-indigo-500/25"
            >
              Try again
            </button>
            <button
              onClick={() => window.location.reload()}
              className="px-5 py-2.5 rounded-xl text-sm font-medium bg-indigo-600 text-white hover:bg-indigo-500"
            >
              Reload
            </button>
          </div>
        </div>
      </div>
    );
  }
}
