import { useEffect, useState } from 'react';
import FilterTable from '../components/FilterTable';
import TableSetPanel from '../components/TableSetPanel';
import WizardStepper from '../components/WizardStepper';
import { useWizardSession } from '../hooks/useWizardSession';
import { SPORT_OPTIONS } from '../types/wizard';
import { buildSteps, STAGE_LABELS } from '../utils/stepper';

const NO_ODDS_VALUE = '';

const WizardPage = () => {
  const {
    session,
    loading,
    notices,
    dismissNotices,
    selectSport,
    selectRows,
    setExtraction,
    advance,
    rewind,
    reset,
    download,
  } = useWizardSession();
  const [selectedIds, setSelectedIds] = useState<number[]>([]);
  const [threshold, setThreshold] = useState('0');

  const state = session?.state;
  const controls = session?.controls;

  useEffect(() => {
    setSelectedIds(state?.selectedParamRows?.map((row) => row.id) ?? []);
  }, [state?.selectedParamRows]);

  useEffect(() => {
    setThreshold(String(state?.dropNaThreshold ?? 0));
  }, [state?.dropNaThreshold]);

  if (loading || !session || !state || !controls) {
    return <p className="alert info">Opening wizard session…</p>;
  }

  const busy = session.pendingStage !== null;
  const oddsValue = state.oddsType === undefined ? (state.availableOddsTypes?.[0] ?? NO_ODDS_VALUE) : (state.oddsType ?? NO_ODDS_VALUE);

  const changeRows = (ids: number[]) => {
    setSelectedIds(ids);
    void selectRows(ids);
  };

  const commitExtraction = (oddsType: string, rawThreshold: string) => {
    const parsed = Number(rawThreshold);
    void setExtraction(oddsType === NO_ODDS_VALUE ? null : oddsType, parsed);
  };

  return (
    <section className="panel">
      <header className="panel-heading">
        <div>
          <h2>Data wizard</h2>
          <p>
            {session.cursor === 'Export' ? 'Mode: export the dataloader' : `Mode: ${STAGE_LABELS[session.cursor]}`}
            {busy && ' · working…'}
          </p>
        </div>
        {controls.cancel.visible && (
          <div className="button-group">
            <button type="button" onClick={() => void reset()} disabled={!controls.cancel.enabled}>
              Cancel
            </button>
          </div>
        )}
      </header>

      {notices.length > 0 && (
        <div className="alert error" role="alert">
          {notices.map((notice, index) => (
            <p key={`${notice.code}-${index}`}>{notice.message}</p>
          ))}
          <button type="button" className="link-button" onClick={dismissNotices}>
            Dismiss
          </button>
        </div>
      )}

      <WizardStepper steps={buildSteps(session.cursor, session.pendingStage)} onRewind={(stage) => void rewind(stage)} />

      {controls.sport.visible && (
        <fieldset className="wizard-section" disabled={!controls.sport.enabled}>
          <legend>Sport</legend>
          <div className="radio-row">
            {SPORT_OPTIONS.map((sport) => (
              <label key={sport}>
                <input
                  type="radio"
                  name="sport"
                  value={sport}
                  checked={state.selectedSport === sport}
                  onChange={() => void selectSport(sport)}
                />
                {sport}
              </label>
            ))}
          </div>
        </fieldset>
      )}

      {controls.filter.visible && state.availableParams && state.filterColumns && (
        <fieldset className="wizard-section" disabled={!controls.filter.enabled}>
          <legend>Filter</legend>
          <FilterTable
            rows={state.availableParams}
            columns={state.filterColumns}
            selectedIds={selectedIds}
            disabled={!controls.filter.enabled}
            onChange={changeRows}
          />
        </fieldset>
      )}

      {controls.extraction.visible && (
        <fieldset className="wizard-section" disabled={!controls.extraction.enabled}>
          <legend>Extraction</legend>
          <div className="settings-field">
            <label htmlFor="oddsType">Odds type</label>
            <select
              id="oddsType"
              value={oddsValue}
              onChange={(event) => commitExtraction(event.target.value, threshold)}
            >
              {session.oddsTypeOptions.map((option) => (
                <option key={option.label} value={option.value ?? NO_ODDS_VALUE}>
                  {option.label}
                </option>
              ))}
            </select>
          </div>
          <div className="settings-field">
            <label htmlFor="dropNa">Drop NA threshold of columns</label>
            <input
              id="dropNa"
              type="number"
              min={0}
              max={1}
              step={0.05}
              className="pill-input"
              value={threshold}
              onChange={(event) => setThreshold(event.target.value)}
              onBlur={() => commitExtraction(oddsValue, threshold)}
            />
          </div>
        </fieldset>
      )}

      {state.trainTables && <TableSetPanel heading="Training data" tables={state.trainTables} />}
      {state.fixtureTables && <TableSetPanel heading="Fixtures data" tables={state.fixtureTables} />}

      <div className="panel-footer">
        {controls.advance.visible && (
          <button type="button" className="primary" onClick={() => void advance()} disabled={!controls.advance.enabled}>
            {busy ? 'Working…' : 'Next'}
          </button>
        )}
        {controls.export.visible && (
          <button type="button" className="primary" onClick={() => void download()} disabled={!controls.export.enabled}>
            Download dataloader
          </button>
        )}
        {session.exported > 0 && <span className="subtle">Exported {session.exported} time(s)</span>}
      </div>
    </section>
  );
};

export default WizardPage;
