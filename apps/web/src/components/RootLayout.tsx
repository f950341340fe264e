import type { PropsWithChildren } from 'react';
import { Link, NavLink } from 'react-router-dom';

const RootLayout = ({ children }: PropsWithChildren) => {
  return (
    <div className="app-shell">
      <header className="app-header">
        <div>
          <h1>
            <Link to="/" className="logo-link">
              Sports Data Wizard
            </Link>
          </h1>
          <p className="app-subtitle">Build training and fixtures data for sports betting models</p>
        </div>
        <div className="app-header-actions">
          <NavLink to="/wizard" className={({ isActive }) => (isActive ? 'settings-link active' : 'settings-link')}>
            Data wizard
          </NavLink>
          <NavLink to="/settings" className={({ isActive }) => (isActive ? 'settings-link active' : 'settings-link')}>
            Settings
          </NavLink>
        </div>
      </header>
      <main>{children}</main>
    </div>
  );
};

export default RootLayout;
