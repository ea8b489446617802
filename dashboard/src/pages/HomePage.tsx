import { Link } from 'react-router-dom';
import { useEffect, useMemo, useState } from 'react';
import type { EChartsOption } from 'echarts';
import type { HomeMetrics } from '../../shared/types';
import { API_RETRY_DELAY_MS, fetchHomeMetrics, isRetryableApiError } from '../lib/api';
import { EChart } from '../components/EChart';
import { LoadingSkeleton } from '../components/LoadingSkeleton';

type HomeLoadState = 'loading' | 'waiting' | 'ready' | 'error';

function priorityMixOption(metrics: HomeMetrics): EChartsOption {
  return {
    tooltip: { trigger: 'item', formatter: '{b}: {c}%' },
    legend: { bottom: 0 },
    series: [
      {
        type: 'pie',
        radius: ['45%', '70%'],
        label: { show: false },
        data: [
          { name: 'High', value: metrics.priorityHighPct, itemStyle: { color: '#dc2626' } },
          { name: 'Medium', value: metrics.priorityMediumPct, itemStyle: { color: '#f59e0b' } },
          { name: 'Moderate', value: metrics.priorityModeratePct, itemStyle: { color: '#10b981' } }
        ]
      }
    ]
  };
}

export function HomePage() {
  const [metrics, setMetrics] = useState<HomeMetrics | null>(null);
  const [loadState, setLoadState] = useState<HomeLoadState>('loading');
  const [loadError, setLoadError] = useState('');

  useEffect(() => {
    let cancelled = false;
    let retryTimer: number | undefined;

    const load = async () => {
      setLoadState('loading');
      setLoadError('');
      try {
        const payload = await fetchHomeMetrics();
        if (cancelled) {
          return;
        }
        setMetrics(payload);
        setLoadState('ready');
      } catch (error) {
        if (cancelled) {
          return;
        }
        setMetrics(null);
        if (isRetryableApiError(error)) {
          setLoadState('waiting');
          retryTimer = window.setTimeout(() => {
            void load();
          }, API_RETRY_DELAY_MS);
          return;
        }
        setLoadError((error as Error).message);
        setLoadState('error');
      }
    };

    void load();

    return () => {
      cancelled = true;
      if (retryTimer !== undefined) {
        window.clearTimeout(retryTimer);
      }
    };
  }, []);

  const mixOption = useMemo(() => (metrics ? priorityMixOption(metrics) : null), [metrics]);

  return (
    <section className="home-layout">
      {loadState === 'waiting' && (
        <p className="waiting-banner">Waiting for API to become available. Retrying every 2 seconds...</p>
      )}
      {loadState === 'error' && <p className="error-banner">{loadError}</p>}

      <div className="summary-card fade-up">
        <p className="eyebrow">Adaptive signal control</p>
        <h2>Four-way intersection simulator</h2>
        <p>
          Launch a simulated intersection with your own signal timings, watch lane counts and waiting times update as the
          run progresses, and stop it at any point.
        </p>
        <p>The city overview ranks where adaptive signals would relieve the most congestion.</p>
        <div className="summary-links">
          <Link to="/simulation">Run a simulation</Link>
          <Link to="/cities">Browse cities</Link>
        </div>
      </div>

      <div className="stats-grid fade-up-delay">
        {metrics === null ? (
          <LoadingSkeleton count={4} ariaLabel="Loading traffic overview" />
        ) : (
          <>
            <article>
              <p className="stat-title">Congestion index</p>
              <strong>{metrics.density}%</strong>
            </article>
            <article>
              <p className="stat-title">Average peak delay</p>
              <strong>{metrics.avgWait} min</strong>
            </article>
            <article>
              <p className="stat-title">Average peak speed</p>
              <strong>{metrics.travelSpeed} km/h</strong>
            </article>
            <article>
              <p className="stat-title">Cities tracked</p>
              <strong>{metrics.cityCount}</strong>
            </article>
          </>
        )}
      </div>

      {mixOption && (
        <div className="panel">
          <h3>Signal upgrade priority</h3>
          <EChart option={mixOption} ariaLabel="Share of cities by upgrade priority" />
        </div>
      )}
    </section>
  );
}
