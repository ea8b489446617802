import { useEffect, useState } from 'react';
import type { CityPayload } from '../../shared/types';
import { API_RETRY_DELAY_MS, fetchCities, isRetryableApiError } from '../lib/api';
import { LoadingSkeleton } from '../components/LoadingSkeleton';

const SEARCH_DEBOUNCE_MS = 250;

function formatMix(mix: Record<string, number>): string {
  const entries = Object.entries(mix).sort((left, right) => right[1] - left[1]);
  if (entries.length === 0) {
    return 'No vehicle mix data';
  }
  return entries.map(([name, share]) => `${name} ${Math.round(share * 100)}%`).join(' · ');
}

function CityCard({ city, selected, onSelect }: { city: CityPayload; selected: boolean; onSelect: () => void }) {
  return (
    <article className={`city-card${selected ? ' selected' : ''}`}>
      <button type="button" className="city-card-button" onClick={onSelect}>
        {city.imageUrl ? (
          <img src={city.imageUrl} alt={city.landmarkName || city.city} loading="lazy" />
        ) : (
          <div className="city-card-placeholder" aria-hidden="true">
            {city.city.slice(0, 1)}
          </div>
        )}
        <div className="city-card-body">
          <h3>{city.city}</h3>
          <p className="muted">
            {city.state} · {city.classification.replace('_', ' ')}
          </p>
          <p>
            <span className={`priority-pill priority-${city.suitability.priority.toLowerCase()}`}>
              {city.suitability.priority}
            </span>{' '}
            score {city.suitability.score}
          </p>
        </div>
      </button>
    </article>
  );
}

function CityDetail({ city }: { city: CityPayload }) {
  return (
    <aside className="panel city-detail">
      <h2>
        {city.city}, {city.state}
      </h2>
      <dl>
        <dt>Population</dt>
        <dd>{city.populationMillions.toFixed(1)}M</dd>
        <dt>Peak speed</dt>
        <dd>{city.avgPeakSpeedKmph} km/h</dd>
        <dt>Peak delay</dt>
        <dd>{city.avgDelayMinutes} min</dd>
        <dt>Vehicle mix</dt>
        <dd>{formatMix(city.vehicleMix)}</dd>
      </dl>
      <h3>Why it ranks here</h3>
      <ul>
        {city.suitability.rationale.map((line) => (
          <li key={line}>{line}</li>
        ))}
      </ul>
      {city.issues.length > 0 && (
        <>
          <h3>Known issues</h3>
          <ul>
            {city.issues.map((issue) => (
              <li key={issue}>{issue}</li>
            ))}
          </ul>
        </>
      )}
      {city.recommendedActions.length > 0 && (
        <>
          <h3>Recommended actions</h3>
          <ul>
            {city.recommendedActions.map((action) => (
              <li key={action}>{action}</li>
            ))}
          </ul>
        </>
      )}
      {city.landmarkUrl && (
        <p className="muted">
          Landmark:{' '}
          <a href={city.landmarkUrl} target="_blank" rel="noreferrer">
            {city.landmarkName || city.landmarkUrl}
          </a>
          {city.imageCredit && ` · Image: ${city.imageCredit}`}
        </p>
      )}
    </aside>
  );
}

export function CitiesPage() {
  const [query, setQuery] = useState('');
  const [cities, setCities] = useState<CityPayload[] | null>(null);
  const [selectedCity, setSelectedCity] = useState<string | null>(null);
  const [waiting, setWaiting] = useState(false);
  const [loadError, setLoadError] = useState('');

  useEffect(() => {
    let cancelled = false;
    let timer: number | undefined;

    const load = async () => {
      try {
        const payload = await fetchCities(query);
        if (cancelled) {
          return;
        }
        setCities(payload.items);
        setWaiting(false);
        setLoadError('');
      } catch (error) {
        if (cancelled) {
          return;
        }
        if (isRetryableApiError(error)) {
          setWaiting(true);
          timer = window.setTimeout(() => {
            void load();
          }, API_RETRY_DELAY_MS);
          return;
        }
        setLoadError((error as Error).message);
      }
    };

    timer = window.setTimeout(() => {
      void load();
    }, SEARCH_DEBOUNCE_MS);

    return () => {
      cancelled = true;
      if (timer !== undefined) {
        window.clearTimeout(timer);
      }
    };
  }, [query]);

  const selected = cities?.find((city) => city.city === selectedCity) ?? cities?.[0] ?? null;

  return (
    <section className="cities-layout">
      {waiting && <p className="waiting-banner">Waiting for API to become available. Retrying every 2 seconds...</p>}
      {loadError && <p className="error-banner">{loadError}</p>}

      <div className="cities-toolbar">
        <input
          type="search"
          placeholder="Search by city, state or tier"
          value={query}
          onChange={(event) => setQuery(event.target.value)}
          aria-label="Search cities"
        />
        {cities && <span className="muted">{cities.length} cities</span>}
      </div>

      {cities === null ? (
        <LoadingSkeleton count={6} ariaLabel="Loading cities" />
      ) : cities.length === 0 ? (
        <p className="muted">No cities match “{query.trim()}”.</p>
      ) : (
        <div className="cities-grid">
          <div className="city-list">
            {cities.map((city) => (
              <CityCard
                key={`${city.city}-${city.state}`}
                city={city}
                selected={selected?.city === city.city}
                onSelect={() => setSelectedCity(city.city)}
              />
            ))}
          </div>
          {selected && <CityDetail city={selected} />}
        </div>
      )}
    </section>
  );
}
