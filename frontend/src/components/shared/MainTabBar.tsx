export type MainTab = 'generate' | 'extensions';

interface MainTabBarProps {
  activeTab: MainTab;
  onTabChange: (tab: MainTab) => void;
  isGenerating: boolean;
  isModifying: boolean;
}

export default function MainTabBar({ activeTab, onTabChange, isGenerating, isModifying }: MainTabBarProps) {
  return (
    <nav className="flex items-center gap-1">
      <TabButton
        label="Text to Image"
        active={activeTab === 'generate'}
        onClick={() => onTabChange('generate')}
        busy={isGenerating}
      />
      <TabButton
        label="Extensions"
        active={activeTab === 'extensions'}
        onClick={() => onTabChange('extensions')}
        busy={isModifying}
      />
    </nav>
  );
}

function TabButton({ label, active, onClick, busy }: {
  label: string;
  active: boolean;
  onClick: () => void;
  busy: boolean;
}) {
  return (
    <button
      onClick={onClick}
      className={`relative px-4 py-1.5 text-sm rounded-lg font-medium transition-colors ${
        active
          ? 'bg-indigo-500/20 text-indigo-300'
          : 'text-slate-400 hover:text-slate-200 hover:bg-slate-800/60'
      }`}
    >
      {label}
      {busy && (
        <span
          data-testid="busy-indicator"
          className="absolute -top-1 -right-1 w-2.5 h-2.5 rounded-full bg-sky-400 animate-pulse"
        />
      )}
    </button>
  );
}
