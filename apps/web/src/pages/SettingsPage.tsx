import type { FormEvent } from 'react';
import { useSettings } from '../hooks/useSettings';

const SettingsPage = () => {
  const { draft, dirty, loading, saving, message, error, updateField, save } = useSettings();

  const handleSubmit = (event: FormEvent) => {
    event.preventDefault();
    void save();
  };

  return (
    <section className="settings-page">
      <header className="settings-header">
        <h2>Loader Settings</h2>
      </header>
      {loading && <p className="alert info">Loading settings...</p>}
      {error && <p className="alert error">{error}</p>}
      <form className="settings-form" onSubmit={handleSubmit}>
        <div className="settings-field">
          <label htmlFor="loaderServiceUrl">Loader service URL</label>
          <input
            id="loaderServiceUrl"
            type="url"
            placeholder="http://localhost:9000"
            value={draft.loaderServiceUrl}
            onChange={(event) => updateField('loaderServiceUrl', event.target.value)}
            className="pill-input"
          />
        </div>
        <div className="settings-field">
          <label htmlFor="defaultThreshold">Default drop NA threshold</label>
          <input
            id="defaultThreshold"
            type="number"
            min={0}
            max={1}
            step={0.05}
            value={draft.defaultDropNaThreshold}
            onChange={(event) => updateField('defaultDropNaThreshold', event.target.value)}
            className="pill-input"
          />
        </div>
        <div className="settings-field">
          <label htmlFor="maxPreviewRows">Rows shown per table</label>
          <input
            id="maxPreviewRows"
            type="number"
            min={1}
            step={1}
            value={draft.maxPreviewRows}
            onChange={(event) => updateField('maxPreviewRows', event.target.value)}
            className="pill-input"
          />
        </div>
        <button type="submit" className="pill-button" disabled={saving || loading || !dirty}>
          {saving ? 'Saving...' : 'Save settings'}
        </button>
        {message && <p className="form-message subtle">{message}</p>}
      </form>
    </section>
  );
};

export default SettingsPage;
