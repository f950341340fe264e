import { useCallback, useEffect, useRef, useState } from 'react';
import * as api from '../services/api';
import type { Stage, WizardNotice, WizardSessionView } from '../types/wizard';

const SESSION_KEY = 'sports-data-wizard:session';
const REFRESH_DELAY_MS = 50;

export const appendNotice = (notices: WizardNotice[], notice: WizardNotice): WizardNotice[] => {
  const last = notices[notices.length - 1];
  if (last && last.code === notice.code && last.message === notice.message) {
    return notices;
  }
  return [...notices.slice(-4), notice];
};

const toNotice = (err: unknown, fallback: string): WizardNotice => {
  if (err instanceof api.ApiError) {
    return { code: err.code ?? `HTTP_${err.status}`, message: err.message };
  }
  return { code: 'CLIENT_ERROR', message: err instanceof Error ? err.message : fallback };
};

export const useWizardSession = () => {
  const [session, setSession] = useState<WizardSessionView | null>(null);
  const [loading, setLoading] = useState(true);
  const [notices, setNotices] = useState<WizardNotice[]>([]);
  const refreshTimer = useRef<number | null>(null);
  const sessionId = session?.sessionId ?? null;

  const pushNotice = useCallback((notice: WizardNotice) => {
    setNotices((prev) => appendNotice(prev, notice));
  }, []);

  const openSession = useCallback(async () => {
    setLoading(true);
    try {
      const storedId = window.localStorage.getItem(SESSION_KEY);
      let result: WizardSessionView | null = null;
      if (storedId) {
        try {
          result = await api.fetchSession(storedId);
        } catch (err) {
          if (!(err instanceof api.ApiError && err.status === 404)) {
            throw err;
          }
        }
      }
      result = result ?? (await api.startSession());
      window.localStorage.setItem(SESSION_KEY, result.sessionId);
      setSession(result);
    } catch (err) {
      pushNotice(toNotice(err, 'Unable to open a wizard session'));
    } finally {
      setLoading(false);
    }
  }, [pushNotice]);

  const refresh = useCallback(async () => {
    if (!sessionId) {
      return;
    }
    try {
      setSession(await api.fetchSession(sessionId));
    } catch (err) {
      pushNotice(toNotice(err, 'Unable to refresh the session'));
    }
  }, [sessionId, pushNotice]);

  const run = useCallback(
    async (action: (id: string) => Promise<WizardSessionView>) => {
      if (!sessionId) {
        return;
      }
      try {
        setSession(await action(sessionId));
      } catch (err) {
        pushNotice(toNotice(err, 'Request failed'));
      }
    },
    [sessionId, pushNotice],
  );

  useEffect(() => {
    void openSession();
  }, [openSession]);

  useEffect(() => {
    if (!sessionId) {
      return;
    }
    const source = new EventSource(api.sessionEventsUrl(sessionId));
    const scheduleRefresh = () => {
      if (refreshTimer.current !== null) {
        window.clearTimeout(refreshTimer.current);
      }
      refreshTimer.current = window.setTimeout(() => {
        refreshTimer.current = null;
        void refresh();
      }, REFRESH_DELAY_MS);
    };
    const onNotice = (event: MessageEvent<string>) => {
      const payload: unknown = JSON.parse(event.data);
      if (typeof payload === 'object' && payload !== null && 'code' in payload && 'message' in payload) {
        pushNotice({ code: String(payload.code), message: String(payload.message) });
      }
    };

    const onClosed = () => {
      source.close();
      window.localStorage.removeItem(SESSION_KEY);
      pushNotice({ code: 'SESSION_CLOSED', message: 'The wizard session ended. A new one was started.' });
      void openSession();
    };

    source.addEventListener('notice', onNotice);
    source.addEventListener('session:closed', onClosed);
    for (const topic of ['cursor', 'fetch:pending', 'fetch:settled', 'stage:invalidated']) {
      source.addEventListener(topic, scheduleRefresh);
    }
    return () => {
      source.close();
      if (refreshTimer.current !== null) {
        window.clearTimeout(refreshTimer.current);
      }
    };
  }, [sessionId, refresh, pushNotice, openSession]);

  const download = useCallback(async () => {
    if (!sessionId) {
      return;
    }
    try {
      const archive = await api.exportLoader(sessionId);
      const url = URL.createObjectURL(archive.blob);
      const link = document.createElement('a');
      link.href = url;
      link.download = archive.fileName;
      link.click();
      URL.revokeObjectURL(url);
      await refresh();
    } catch (err) {
      pushNotice(toNotice(err, 'Unable to export the loader'));
    }
  }, [sessionId, refresh, pushNotice]);

  return {
    session,
    loading,
    notices,
    dismissNotices: () => setNotices([]),
    selectSport: (sport: string) => run((id) => api.selectSport(id, sport)),
    selectRows: (rowIds: number[]) => run((id) => api.submitFilterRows(id, rowIds, false)),
    setExtraction: (oddsType: string | null, threshold: number) =>
      run((id) => api.setExtractionConfig(id, oddsType, threshold)),
    advance: () => run((id) => api.advance(id)),
    rewind: (stage: Stage) => run((id) => api.rewind(id, stage)),
    reset: () => run((id) => api.resetSession(id)),
    download,
  };
};
