import { useCallback, useEffect, useState } from 'react';
import { AlertCircle, Calculator, Ruler, TrendingUp } from 'lucide-react';
import SiteParametersForm from './components/SiteParametersForm';
import AllocationSummary from './components/AllocationSummary';
import EstimateSectionTable from './components/EstimateSectionTable';
import EstimateSummary from './components/EstimateSummary';
import ProformaPanel from './components/ProformaPanel';
import ErrorBoundary from './components/ErrorBoundary';
import {
  createSession,
  editLineItem,
  pendingOverwrites,
  regenerateEstimate,
  setPricePolicy,
  updateProformaInputs,
  updateProjectInfo,
  updateSiteParameters,
} from './lib/sync';
import { loadExampleProject } from './lib/examples';
import { config } from './lib/config';
import type { EstimateCategory, LineItemPatch, PricePolicy, ProjectInfo, SiteParameters } from './types/estimate';
import type { ProformaInputsPatch } from './types/proforma';
import type { SessionState, SyncOutcome } from './types/session';

type Tab = 'estimate' | 'proforma';

const VALID_TABS: Tab[] = ['estimate', 'proforma'];

function parseHash(): Tab {
  const raw = window.location.hash.replace(/^#\/?/, '');
  return VALID_TABS.find((t) => t === raw) ?? 'estimate';
}

function useHashTab() {
  const [tab, setTabState] = useState<Tab>(parseHash);

  const setTab = useCallback((next: Tab) => {
    setTabState(next);
    if (window.location.hash !== `#${next}`) window.history.pushState(null, '', `#${next}`);
  }, []);

  useEffect(() => {
    const onHashChange = () => setTabState(parseHash());
    window.addEventListener('hashchange', onHashChange);
    return () => window.removeEventListener('hashchange', onHashChange);
  }, []);

  return { tab, setTab };
}

const PROJECT_FIELDS: { field: keyof ProjectInfo; label: string }[] = [
  { field: 'name', label: 'Project' },
  { field: 'location', label: 'Location' },
  { field: 'preparedBy', label: 'Prepared By' },
  { field: 'date', label: 'Date' },
];

function projectPatch(field: keyof ProjectInfo, value: string): Partial<ProjectInfo> {
  const patch: Partial<ProjectInfo> = {};
  patch[field] = value;
  return patch;
}

export default function App() {
  const { tab, setTab } = useHashTab();
  const [session, setSession] = useState<SessionState>(() =>
    createSession({ options: { pricePolicy: config.pricePolicy } }),
  );
  const [error, setError] = useState<string | null>(null);
  const [notice, setNotice] = useState<string | null>(null);

  const apply = useCallback((outcome: SyncOutcome) => {
    setSession(outcome.state);
    if (!outcome.ok) {
      setError(outcome.error.message);
      return;
    }
    setError(null);
    setNotice(
      outcome.overwritten.length > 0
        ? `Pro forma overrides replaced by estimate values: ${outcome.overwritten.join(', ')}`
        : null,
    );
  }, []);

  const handleSite = (site: SiteParameters) => apply(updateSiteParameters(session, site));
  const handleEdit = (category: EstimateCategory, code: string, patch: LineItemPatch) =>
    apply(editLineItem(session, category, code, patch));
  const handleProforma = (patch: ProformaInputsPatch) => apply(updateProformaInputs(session, patch));
  const handleProject = (patch: Partial<ProjectInfo>) => apply(updateProjectInfo(session, patch));
  const handlePricePolicy = (policy: PricePolicy) => apply(setPricePolicy(session, policy));
  const handleRestore = () => apply(regenerateEstimate(session));

  const handleLoadExample = () => {
    setSession(loadExampleProject({ pricePolicy: config.pricePolicy }));
    setError(null);
    setNotice(null);
  };

  const tabButton = (t: Tab, label: string, Icon: typeof Calculator) => (
    <button
      onClick={() => setTab(t)}
      className={`flex items-center gap-1.5 px-3 py-1.5 rounded-md text-xs font-medium transition-all ${
        tab === t ? 'bg-white text-slate-800 shadow-sm' : 'text-slate-500 hover:text-slate-700'
      }`}
    >
      <Icon className="h-3.5 w-3.5" />
      {label}
    </button>
  );

  return (
    <div className="min-h-screen bg-slate-50">
      <header className="bg-white border-b border-slate-200 sticky top-0 z-10">
        <div className="max-w-6xl mx-auto px-4 py-4 flex items-center justify-between">
          <div className="flex items-center gap-3">
            <div className="w-9 h-9 rounded-lg bg-teal-700 flex items-center justify-center">
              <Ruler className="h-5 w-5 text-white" />
            </div>
            <div>
              <h1 className="text-lg font-bold text-slate-800 leading-tight">Subdivision Estimator</h1>
              <p className="text-xs text-slate-400">Site allocation, itemized hard costs and development pro forma</p>
            </div>
          </div>

          <nav className="flex items-center bg-slate-100 rounded-lg p-0.5">
            {tabButton('estimate', 'Estimate', Calculator)}
            {tabButton('proforma', 'Pro Forma', TrendingUp)}
          </nav>
        </div>
      </header>

      <main className="max-w-6xl mx-auto px-4 py-6 space-y-5">
        <div className="grid grid-cols-2 md:grid-cols-4 gap-3">
          {PROJECT_FIELDS.map(({ field, label }) => (
            <label key={field} className="text-xs text-slate-500 space-y-1">
              <span>{label}</span>
              <input
                type={field === 'date' ? 'date' : 'text'}
                value={session.projectInfo[field]}
                onChange={(e) => handleProject(projectPatch(field, e.target.value))}
                className="w-full px-2 py-1.5 text-sm border border-slate-200 rounded-md bg-white"
              />
            </label>
          ))}
        </div>

        {error && (
          <div className="flex items-center gap-2 bg-red-50 border border-red-200 rounded-lg p-3 text-sm text-red-700">
            <AlertCircle className="h-4 w-4 flex-shrink-0" />
            {error}
          </div>
        )}
        {notice && (
          <div className="bg-amber-50 border border-amber-200 rounded-lg p-3 text-xs text-amber-800">{notice}</div>
        )}

        {tab === 'estimate' && (
          <ErrorBoundary label="Estimate" onReset={handleLoadExample}>
            <div className="space-y-5">
              <SiteParametersForm
                site={session.site}
                pricePolicy={session.options.pricePolicy}
                onSubmit={handleSite}
                onPricePolicyChange={handlePricePolicy}
                onLoadExample={handleLoadExample}
              />
              <AllocationSummary allocation={session.estimate.allocation} />
              <EstimateSummary estimate={session.estimate} />
              {session.estimate.sections.map((section) => (
                <EstimateSectionTable key={section.category} section={section} onEdit={handleEdit} />
              ))}
            </div>
          </ErrorBoundary>
        )}

        {tab === 'proforma' && (
          <ErrorBoundary label="Pro Forma" onReset={handleLoadExample}>
            <ProformaPanel
              inputs={session.proformaInputs}
              result={session.proforma}
              projectInfo={session.projectInfo}
              pendingOverwrites={pendingOverwrites(session)}
              onChange={handleProforma}
              onRestoreFromEstimate={handleRestore}
            />
          </ErrorBoundary>
        )}
      </main>
    </div>
  );
}
