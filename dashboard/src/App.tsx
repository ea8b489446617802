import { NavLink, Navigate, Route, Routes } from 'react-router-dom';
import { CitiesPage } from './pages/CitiesPage';
import { HomePage } from './pages/HomePage';
import { SimulationPage } from './pages/SimulationPage';

export function App() {
  const isDevEnv = import.meta.env.DEV;

  return (
    <div className="app-shell">
      <header className="app-header">
        <div className="brand-wrap">
          <p className="eyebrow">Adaptive Traffic Signals</p>
          <h1 className="brand-title">
            <span>Intersection Dashboard</span>
            {isDevEnv && <span className="env-pill-dev">Dev</span>}
          </h1>
        </div>
        <div className="header-nav-wrap">
          <nav className="main-nav" aria-label="Main">
            <NavLink to="/" end>
              Home
            </NavLink>
            <NavLink to="/simulation">Simulation</NavLink>
            <NavLink to="/cities">Cities</NavLink>
          </nav>
        </div>
      </header>

      <main className="app-main">
        <Routes>
          <Route path="/" element={<HomePage />} />
          <Route path="/simulation" element={<SimulationPage />} />
          <Route path="/cities" element={<CitiesPage />} />
          <Route path="/dashboard" element={<Navigate to="/simulation" replace />} />
          <Route path="*" element={<Navigate to="/" replace />} />
        </Routes>
      </main>
    </div>
  );
}
