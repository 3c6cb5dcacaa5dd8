import { describe, it, expect, vi } from 'vitest';
import { render, screen, fireEvent } from '@testing-library/react';
import ConnectionBar from './ConnectionBar';

const defaultProps = {
  connected: false,
  address: null,
  connecting: false,
  error: null,
  onConnect: vi.fn(),
  onDisconnect: vi.fn(),
};

describe('ConnectionBar', () => {
  it('connects to the default address when the field is empty', () => {
    const onConnect = vi.fn();
    render(<ConnectionBar {...defaultProps} onConnect={onConnect} />);
    fireEvent.click(screen.getByText('Connect'));
    expect(onConnect).toHaveBeenCalledWith(undefined);
  });

  it('connects to a typed address', () => {
    const onConnect = vi.fn();
    render(<ConnectionBar {...defaultProps} onConnect={onConnect} />);
    fireEvent.change(screen.getByLabelText('Backend address'), { target: { value: ' http://10.0.0.7:8188 ' } });
    fireEvent.click(screen.getByText('Connect'));
    expect(onConnect).toHaveBeenCalledWith('http://10.0.0.7:8188');
  });

  it('shows progress and errors', () => {
    render(<ConnectionBar {...defaultProps} connecting={true} error="Could not connect to the inference backend: ECONNREFUSED" />);
    expect(screen.getByText('Connecting...')).toBeDisabled();
    expect(screen.getByText('Could not connect to the inference backend: ECONNREFUSED')).toBeInTheDocument();
  });

  it('shows the address and disconnects', () => {
    const onDisconnect = vi.fn();
    render(<ConnectionBar {...defaultProps} connected={true} address="http://comfy.test/" onDisconnect={onDisconnect} />);
    expect(screen.getByText('Connected to http://comfy.test/')).toBeInTheDocument();
    fireEvent.click(screen.getByText('Disconnect'));
    expect(onDisconnect).toHaveBeenCalled();
  });
});
