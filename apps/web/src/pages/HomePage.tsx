import { useNavigate } from 'react-router-dom';

const HomePage = () => {
  const navigate = useNavigate();

  const featureChips: Array<{ label: string; onClick?: () => void }> = [
    { label: 'Data wizard', onClick: () => navigate('/wizard') },
    { label: 'Loader settings', onClick: () => navigate('/settings') },
    { label: 'Model training' },
  ];

  return (
    <section className="home-page">
      <header className="home-hero">
        <h2>Dashboard</h2>
        <p>Pick a sport, filter the leagues and seasons you care about, then extract training and fixtures data.</p>
      </header>
      <div className="feature-chip-grid">
        {featureChips.map((feature) => (
          <button
            key={feature.label}
            type="button"
            className="feature-chip"
            onClick={feature.onClick}
            disabled={!feature.onClick}
          >
            {feature.label}
          </button>
        ))}
      </div>
    </section>
  );
};

export default HomePage;
