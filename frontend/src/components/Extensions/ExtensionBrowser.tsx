import type { InstalledPackageExtension, ModificationResult, PackageExtension } from '../../types';
import type { ProjectedList } from '../../lib/projectedList';
import { installedExtensionTitle } from '../../lib/extensions';
import type { ExtensionBrowserState, ModificationProgress } from '../../hooks/useExtensionBrowser';

interface Props {
  browser: ExtensionBrowserState;
}

const inputClass = 'px-2 py-1 rounded-lg bg-slate-800 border border-slate-700 text-slate-100 text-sm';
const buttonClass = 'px-3 py-1.5 rounded-lg text-sm font-medium disabled:opacity-50';

function ExtensionList<T>({ heading, list, titleOf, subtitleOf, actionLabel, disabled, onAction }: {
  heading: string;
  list: ProjectedList<T, string>;
  titleOf: (item: T) => string;
  subtitleOf: (item: T) => string;
  actionLabel: string;
  disabled: boolean;
  onAction: () => void;
}) {
  const selectedCount = list.selected.length;

  return (
    <section className="flex flex-col gap-2 min-w-0">
      <div className="flex items-center justify-between">
        <h3 className="text-sm font-semibold text-slate-200">
          {heading} <span className="text-slate-500">({list.items.length})</span>
        </h3>
        <button
          onClick={onAction}
          disabled={disabled || selectedCount === 0}
          className={`${buttonClass} bg-indigo-600 text-white hover:bg-indigo-500`}
        >
          {actionLabel} ({selectedCount})
        </button>
      </div>
      <input
        value={list.searchQuery}
        onChange={e => list.setSearchQuery(e.target.value)}
        placeholder="Search"
        aria-label={`Search ${heading.toLowerCase()} extensions`}
        className={inputClass}
      />
      <ul className="flex flex-col gap-1 max-h-[60vh] overflow-y-auto">
        {list.filteredEntries.map(({ key, wrapper }) => {
          const title = titleOf(wrapper.item);
          return (
            <li key={key}>
              <label className="flex items-start gap-2 px-2 py-1.5 rounded-lg hover:bg-slate-800/60 cursor-pointer">
                <input
                  type="checkbox"
                  checked={wrapper.isSelected}
                  onChange={() => wrapper.toggle()}
                  aria-label={title}
                  className="mt-1"
                />
                <span className="flex flex-col min-w-0">
                  <span className="text-sm text-slate-100">{title}</span>
                  <span className="text-xs text-slate-500 truncate">{subtitleOf(wrapper.item)}</span>
                </span>
              </label>
            </li>
          );
        })}
        {list.filteredEntries.length === 0 && <li className="text-xs text-slate-500 px-2">No extensions</li>}
      </ul>
    </section>
  );
}

function ModificationStatus({ modification }: { modification: ModificationProgress }) {
  const percent = modification.value === null ? null : Math.round(modification.value * 100);
  return (
    <div className="rounded-xl border border-slate-800 p-3 flex flex-col gap-1" data-testid="modification-status">
      <p className="text-sm text-slate-200">
        {modification.done
          ? 'Finished'
          : `Step ${modification.stepIndex + 1} of ${modification.totalSteps}: ${modification.title}`}
      </p>
      {!modification.done && modification.message && (
        <p className="text-xs text-slate-400">{modification.message}</p>
      )}
      <div
        role="progressbar"
        aria-valuenow={percent ?? undefined}
        aria-valuemax={100}
        className="h-1.5 rounded-full bg-slate-800 overflow-hidden"
      >
        <div
          className={`h-full bg-indigo-500 ${percent === null ? 'animate-pulse w-full' : ''}`}
          style={percent === null ? undefined : { width: `${percent}%` }}
        />
      </div>
      {modification.errors.map(error => (
        <p key={error} className="text-xs text-red-300">{error}</p>
      ))}
    </div>
  );
}

function resultText(result: ModificationResult): string {
  const steps = `${result.completed_steps} step${result.completed_steps === 1 ? '' : 's'}`;
  return result.failed ? `Failed after ${steps}` : `Completed ${steps}`;
}

function installedSubtitle(ext: InstalledPackageExtension): string {
  return ext.gitRepositoryUrl ?? ext.paths[0] ?? '';
}

export default function ExtensionBrowser({ browser }: Props) {
  const {
    packages, selectedPackage, isLoading, isModifying, available, installed,
    error, lastResult, modification, selectPackage, refresh, installSelected, uninstallSelected,
  } = browser;

  return (
    <div className="flex flex-col gap-4">
      <div className="flex items-center gap-3">
        <select
          aria-label="Package"
          value={selectedPackage?.id ?? ''}
          onChange={e => void selectPackage(packages.find(p => p.id === e.target.value) ?? null)}
          className={inputClass}
        >
          <option value="">Select a package</option>
          {packages.map(pkg => (
            <option key={pkg.id} value={pkg.id}>{pkg.displayName}</option>
          ))}
        </select>
        <button
          onClick={() => void refresh()}
          disabled={!selectedPackage || isLoading || isModifying}
          className={`${buttonClass} bg-slate-800 text-slate-200 hover:bg-slate-700`}
        >
          Refresh
        </button>
        {isLoading && <span className="text-xs text-slate-400">Loading extensions...</span>}
        {lastResult && <span className="text-xs text-slate-400">{resultText(lastResult)}</span>}
      </div>

      {error && <p className="text-sm text-red-300">{error}</p>}
      {modification && <ModificationStatus modification={modification} />}

      <div className="grid grid-cols-2 gap-6">
        <ExtensionList<PackageExtension>
          heading="Available"
          list={available}
          titleOf={ext => ext.title}
          subtitleOf={ext => ext.reference}
          actionLabel="Install selected"
          disabled={isModifying}
          onAction={() => void installSelected()}
        />
        <ExtensionList<InstalledPackageExtension>
          heading="Installed"
          list={installed}
          titleOf={installedExtensionTitle}
          subtitleOf={installedSubtitle}
          actionLabel="Uninstall selected"
          disabled={isModifying}
          onAction={() => void uninstallSelected()}
        />
      </div>
    </div>
  );
}
