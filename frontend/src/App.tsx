import { useState, useCallback, useEffect } from 'react';
import MainTabBar, { type MainTab } from './components/shared/MainTabBar';
import ReadinessBadge from './components/shared/ReadinessBadge';
import NotificationToast from './components/shared/NotificationToast';
import ApiErrorModal from './components/shared/ApiErrorModal';
import ConnectionBar from './components/TextToImage/ConnectionBar';
import TextToImagePanel from './components/TextToImage/TextToImagePanel';
import ExtensionBrowser from './components/Extensions/ExtensionBrowser';
import { useWebSocket } from './hooks/useWebSocket';
import { useHealthCheck } from './hooks/useHealthCheck';
import { useTextToImage } from './hooks/useTextToImage';
import { useInferenceConnection } from './hooks/useInferenceConnection';
import { useExtensionBrowser } from './hooks/useExtensionBrowser';
import type { WSEvent } from './types';

export default function App() {
  const [activeTab, setActiveTab] = useState<MainTab>('generate');

  const connection = useInferenceConnection();
  const textToImage = useTextToImage();
  const extensions = useExtensionBrowser();
  const { health, loading: healthLoading, refresh: refreshHealth } = useHealthCheck(true);

  const {
    handleEvent: handleConnectionEvent,
    options,
  } = connection;
  const { handleEvent: handleGenerationEvent, applyInferenceOptions } = textToImage;
  const { handleEvent: handleExtensionEvent } = extensions;

  const handleEvent = useCallback((event: WSEvent) => {
    handleConnectionEvent(event);
    handleGenerationEvent(event);
    handleExtensionEvent(event);
    if (event.type === 'inference_connected' || event.type === 'inference_disconnected') {
      void refreshHealth();
    }
  }, [handleConnectionEvent, handleGenerationEvent, handleExtensionEvent, refreshHealth]);

  useWebSocket({ onEvent: handleEvent });

  useEffect(() => {
    applyInferenceOptions(options);
  }, [options, applyInferenceOptions]);

  return (
    <div className="min-h-screen bg-slate-950 text-slate-100 flex flex-col">
      <header className="flex items-center justify-between gap-4 px-6 py-3 border-b border-slate-800">
        <div className="flex items-center gap-4">
          <h1 className="text-lg font-semibold">Inference Desk</h1>
          <MainTabBar
            activeTab={activeTab}
            onTabChange={setActiveTab}
            isGenerating={textToImage.isGenerating}
            isModifying={extensions.isModifying}
          />
        </div>
        <div className="flex items-center gap-4">
          <ConnectionBar
            connected={connection.connected}
            address={connection.address}
            connecting={connection.connecting}
            error={connection.error}
            onConnect={target => void connection.connect(target)}
            onDisconnect={() => void connection.disconnect()}
          />
          <ReadinessBadge health={health} loading={healthLoading} />
        </div>
      </header>

      <main className="flex-1 p-6">
        {activeTab === 'generate' ? (
          <TextToImagePanel
            parameters={textToImage.parameters}
            options={options}
            connected={connection.connected}
            isGenerating={textToImage.isGenerating}
            progress={textToImage.progress}
            preview={textToImage.preview}
            images={textToImage.images}
            onChange={textToImage.updateParameters}
            onGenerate={() => void textToImage.generate()}
            onCancel={() => void textToImage.cancel()}
          />
        ) : (
          <ExtensionBrowser browser={extensions} />
        )}
      </main>

      <NotificationToast notification={textToImage.notification} onDismiss={textToImage.dismissNotification} />
      {textToImage.apiError && (
        <ApiErrorModal error={textToImage.apiError} onClose={textToImage.dismissApiError} />
      )}
    </div>
  );
}
