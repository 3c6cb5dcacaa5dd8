import { describe, it, expect, vi, beforeEach } from 'vitest';
import { render, screen, fireEvent } from '@testing-library/react';
import App from './App';
import { useWebSocket } from './hooks/useWebSocket';
import { useTextToImage } from './hooks/useTextToImage';
import { useInferenceConnection } from './hooks/useInferenceConnection';
import { useExtensionBrowser } from './hooks/useExtensionBrowser';
import { useHealthCheck } from './hooks/useHealthCheck';
import { defaultParameters } from './lib/generationParameters';

const options = { models: ['sd15.safetensors'], samplers: ['euler'], upscaleMethods: ['nearest-exact'] };

const connection = {
  connected: true,
  address: 'http://comfy.test/',
  options,
  connecting: false,
  error: null,
  connect: vi.fn(),
  disconnect: vi.fn(),
  handleEvent: vi.fn(),
};

const textToImage = {
  parameters: defaultParameters(3),
  updateParameters: vi.fn(),
  applyInferenceOptions: vi.fn(),
  generationId: null,
  isGenerating: false,
  lastStatus: null,
  progress: { value: 0, maximum: 0, text: '', isIndeterminate: false },
  preview: null,
  images: [],
  apiError: null as { title: string; message: string; details?: string } | null,
  notification: null as { title: string; message: string } | null,
  handleEvent: vi.fn(),
  generate: vi.fn(),
  cancel: vi.fn(),
  dismissApiError: vi.fn(),
  dismissNotification: vi.fn(),
};

vi.mock('./hooks/useWebSocket', () => ({
  useWebSocket: vi.fn(() => ({ connected: true })),
}));

vi.mock('./hooks/useHealthCheck', () => ({
  useHealthCheck: vi.fn(() => ({
    health: { status: 'ready', inference: 'connected', address: 'http://comfy.test/' },
    loading: false,
    refresh: vi.fn(),
  })),
}));

vi.mock('./hooks/useInferenceConnection', () => ({
  useInferenceConnection: vi.fn(),
}));

vi.mock('./hooks/useTextToImage', () => ({
  useTextToImage: vi.fn(),
}));

vi.mock('./hooks/useExtensionBrowser', () => ({
  useExtensionBrowser: vi.fn(),
}));

vi.mock('./components/Extensions/ExtensionBrowser', () => ({
  default: vi.fn(() => <div data-testid="extension-browser">ExtensionBrowser</div>),
}));

describe('App', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    textToImage.apiError = null;
    textToImage.notification = null;
    vi.mocked(useInferenceConnection).mockReturnValue(connection);
    vi.mocked(useTextToImage).mockImplementation(() => textToImage);
    vi.mocked(useExtensionBrowser).mockReturnValue({
      isModifying: false,
      handleEvent: vi.fn(),
    } as unknown as ReturnType<typeof useExtensionBrowser>);
  });

  it('starts on the text to image tab', () => {
    render(<App />);
    expect(screen.getByLabelText('Prompt')).toBeInTheDocument();
    expect(screen.getByText('Connected to http://comfy.test/')).toBeInTheDocument();
    expect(screen.getByText('Ready')).toBeInTheDocument();
  });

  it('switches to the extension browser', () => {
    render(<App />);
    fireEvent.click(screen.getByText('Extensions'));
    expect(screen.getByTestId('extension-browser')).toBeInTheDocument();
    expect(screen.queryByLabelText('Prompt')).toBeNull();
  });

  it('applies the backend options to the parameters', () => {
    render(<App />);
    expect(textToImage.applyInferenceOptions).toHaveBeenCalledWith(options);
  });

  it('dispatches socket events to every hook', () => {
    render(<App />);
    const { onEvent } = vi.mocked(useWebSocket).mock.calls[0][0];
    const event = { type: 'inference_disconnected' } as const;

    onEvent(event);

    expect(connection.handleEvent).toHaveBeenCalledWith(event);
    expect(textToImage.handleEvent).toHaveBeenCalledWith(event);
    expect(vi.mocked(useExtensionBrowser).mock.results[0].value.handleEvent).toHaveBeenCalledWith(event);
    expect(vi.mocked(useHealthCheck).mock.results[0].value.refresh).toHaveBeenCalled();
  });

  it('generates from the panel', () => {
    render(<App />);
    fireEvent.click(screen.getByText('Generate'));
    expect(textToImage.generate).toHaveBeenCalled();
  });

  it('shows notifications and api errors', () => {
    textToImage.notification = { title: 'Client not connected', message: 'Please connect first' };
    textToImage.apiError = { title: 'Api Error', message: 'Prompt outputs failed validation' };
    render(<App />);

    expect(screen.getByRole('alert')).toHaveTextContent('Client not connected');
    expect(screen.getByRole('dialog')).toHaveTextContent('Prompt outputs failed validation');
    fireEvent.click(screen.getByText('Close'));
    expect(textToImage.dismissApiError).toHaveBeenCalled();
  });
});
