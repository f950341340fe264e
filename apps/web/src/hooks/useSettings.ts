import { useCallback, useEffect, useState } from 'react';
import { fetchSettings, saveSettings } from '../services/api';
import { defaultSettings } from '../types/settings';
import { parseDraft, type SettingsDraft, type SettingsField, toDraft } from '../utils/settingsDraft';

/**
 * Loader settings as an editable draft. Fields are edited one at a time and
 * only a draft that parses is sent to the server.
 */
export const useSettings = () => {
  const [draft, setDraft] = useState<SettingsDraft>(() => toDraft(defaultSettings));
  const [dirty, setDirty] = useState(false);
  const [loading, setLoading] = useState(true);
  const [saving, setSaving] = useState(false);
  const [message, setMessage] = useState<string | null>(null);
  const [error, setError] = useState<string | null>(null);

  useEffect(() => {
    let active = true;
    fetchSettings()
      .then((loaded) => {
        if (active) {
          setDraft(toDraft(loaded));
        }
      })
      .catch((err: unknown) => {
        if (active) {
          setError(err instanceof Error ? err.message : 'Unable to load settings');
        }
      })
      .finally(() => {
        if (active) {
          setLoading(false);
        }
      });
    return () => {
      active = false;
    };
  }, []);

  const updateField = useCallback((field: SettingsField, value: string) => {
    setDraft((current) => ({ ...current, [field]: value }));
    setDirty(true);
    setMessage(null);
  }, []);

  const save = useCallback(async () => {
    const parsed = parseDraft(draft);
    if (!parsed.ok) {
      setError(parsed.error);
      return;
    }
    setSaving(true);
    setError(null);
    try {
      const saved = await saveSettings(parsed.settings);
      setDraft(toDraft(saved));
      setDirty(false);
      setMessage('Settings saved. New wizard sessions use them.');
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Unable to save settings');
    } finally {
      setSaving(false);
    }
  }, [draft]);

  return { draft, dirty, loading, saving, message, error, updateField, save };
};
