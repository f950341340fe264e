import type { AppSettings } from '../types/settings';

/** Form values as typed; numbers stay strings until the draft is parsed. */
export interface SettingsDraft {
  loaderServiceUrl: string;
  defaultDropNaThreshold: string;
  maxPreviewRows: string;
}

export type SettingsField = keyof SettingsDraft;

export type DraftResult = { ok: true; settings: AppSettings } | { ok: false; error: string };

export const toDraft = (settings: AppSettings): SettingsDraft => ({
  loaderServiceUrl: settings.loaderServiceUrl ?? '',
  defaultDropNaThreshold: String(settings.defaultDropNaThreshold),
  maxPreviewRows: String(settings.maxPreviewRows),
});

export const parseDraft = (draft: SettingsDraft): DraftResult => {
  const url = draft.loaderServiceUrl.trim();
  if (url && !/^https?:\/\/\S+$/i.test(url)) {
    return { ok: false, error: 'Loader service URL must start with http:// or https://.' };
  }

  const threshold = Number(draft.defaultDropNaThreshold);
  if (draft.defaultDropNaThreshold.trim() === '' || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    return { ok: false, error: 'Default drop NA threshold must be between 0 and 1.' };
  }

  const maxRows = Number(draft.maxPreviewRows);
  if (!Number.isInteger(maxRows) || maxRows < 1) {
    return { ok: false, error: 'Rows shown per table must be a whole number of at least 1.' };
  }

  return {
    ok: true,
    settings: { loaderServiceUrl: url || null, defaultDropNaThreshold: threshold, maxPreviewRows: maxRows },
  };
};
