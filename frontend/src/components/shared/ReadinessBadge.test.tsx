import { describe, it, expect } from 'vitest';
import { render, screen } from '@testing-library/react';
import ReadinessBadge from './ReadinessBadge';

describe('ReadinessBadge', () => {
  it('shows a checking state while loading', () => {
    render(<ReadinessBadge health={{ status: 'offline', inference: 'disconnected', address: null }} loading={true} />);
    expect(screen.getByText('Checking...')).toBeInTheDocument();
  });

  it('shows Ready with the backend address', () => {
    render(
      <ReadinessBadge
        health={{ status: 'ready', inference: 'connected', address: 'http://127.0.0.1:8188' }}
        loading={false}
      />,
    );
    const badge = screen.getByText('Ready');
    expect(badge).toHaveAttribute('title', 'Connected to http://127.0.0.1:8188');
  });

  it('shows Not Connected while degraded', () => {
    render(
      <ReadinessBadge
        health={{ status: 'degraded', inference: 'disconnected', address: 'http://127.0.0.1:8188' }}
        loading={false}
      />,
    );
    expect(screen.getByText('Not Connected')).toHaveAttribute(
      'title',
      'Inference backend not connected (http://127.0.0.1:8188)',
    );
  });

  it('shows Offline when the backend is unreachable', () => {
    render(<ReadinessBadge health={{ status: 'offline', inference: 'disconnected', address: null }} loading={false} />);
    expect(screen.getByText('Offline')).toHaveAttribute('title', 'Backend not reachable');
  });
});
