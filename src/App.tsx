import { useEffect } from 'react';
import { AlertTriangle, RefreshCw } from 'lucide-react';
import { config } from './config';
import { useDashboardStore } from './stores/dashboardStore';
import { Sidebar } from './components/layout/Sidebar';
import { SummaryCards } from './components/dashboard/SummaryCards';
import { OutcomeSplitChart } from './components/dashboard/OutcomeSplitChart';
import { AgeDistributionChart } from './components/dashboard/AgeDistributionChart';
import { WeekdayChart } from './components/dashboard/WeekdayChart';
import { NeighbourhoodChart } from './components/dashboard/NeighbourhoodChart';
import { AppointmentTable } from './components/dashboard/AppointmentTable';
import { ErrorBoundary } from './components/shared/ErrorBoundary';

function App() {
  const { loadStatus, loadError, loadDataset, table, columnKinds, view, dashboard } = useDashboardStore();

  // Load the dataset once on mount
  useEffect(() => {
    void loadDataset();
  }, [loadDataset]);

  return (
    <div className="h-screen flex">
      <Sidebar />

      {loadStatus === 'loading' && (
        <div className="fixed inset-0 bg-black/20 flex items-center justify-center z-50">
          <div className="bg-[var(--bg)] rounded-lg p-6 shadow-xl">
            <div className="flex items-center gap-3">
              <div className="animate-spin h-5 w-5 border-2 border-[var(--accent)] border-t-transparent rounded-full"></div>
              <span className="text-[var(--text-muted)]">Loading appointments...</span>
            </div>
          </div>
        </div>
      )}

      {loadStatus === 'error' && (
        <div className="fixed inset-0 bg-black/30 flex items-center justify-center z-50">
          <div className="bg-[var(--bg)] rounded-lg p-6 shadow-xl max-w-md mx-4">
            <div className="flex items-start gap-4">
              <div className="flex-shrink-0 w-10 h-10 rounded-full bg-[var(--danger)]/10 flex items-center justify-center">
                <AlertTriangle className="w-5 h-5 text-[var(--danger)]" />
              </div>
              <div className="flex-1">
                <h3 className="text-lg font-semibold text-[var(--text)] mb-2">Unable to Load Appointments</h3>
                <p className="text-sm text-[var(--text-muted)] mb-4 break-words">
                  {loadError?.message ?? 'The dataset could not be loaded.'}
                </p>
                <button
                  type="button"
                  onClick={() => void loadDataset()}
                  className="flex items-center gap-2 px-4 py-2 bg-[var(--accent)] hover:bg-[var(--accent)]/90 text-white rounded-md text-sm font-medium transition-colors"
                >
                  <RefreshCw className="w-4 h-4" />
                  Retry
                </button>
                <p className="text-xs text-[var(--text-dim)] mt-4">
                  Source: <code className="bg-[var(--bg-tertiary)] px-1 py-0.5 rounded">{config.datasetUrl}</code>
                </p>
              </div>
            </div>
          </div>
        </div>
      )}

      <main className="flex-1 overflow-auto bg-[var(--bg)]">
        <div className="p-6 space-y-6 max-w-[1600px] mx-auto">
          <h1 className="text-2xl font-bold text-[var(--text)]">Medical Appointments Dashboard</h1>

          {table && dashboard && (
            <>
              <ErrorBoundary fallbackName="Summary">
                <SummaryCards stats={dashboard.stats} />
              </ErrorBoundary>

              <div className="grid grid-cols-1 lg:grid-cols-2 gap-4">
                <ErrorBoundary fallbackName="Show vs No-show">
                  <OutcomeSplitChart data={dashboard.outcomeSplit} />
                </ErrorBoundary>
                <ErrorBoundary fallbackName="Age Distribution">
                  <AgeDistributionChart data={dashboard.ageHistogram} />
                </ErrorBoundary>
                <ErrorBoundary fallbackName="Appointments by Day of Week">
                  <WeekdayChart data={dashboard.weekdayHistogram} />
                </ErrorBoundary>
                <ErrorBoundary fallbackName="Neighbourhood No-show Rates">
                  <NeighbourhoodChart data={dashboard.topNeighbourhoods} />
                </ErrorBoundary>
              </div>

              <ErrorBoundary fallbackName="Appointments Table">
                <AppointmentTable
                  columns={table.columns}
                  columnKinds={columnKinds}
                  view={view}
                  pageSize={config.tablePageSize}
                />
              </ErrorBoundary>
            </>
          )}
        </div>
      </main>
    </div>
  );
}

export default App;
