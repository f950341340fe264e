import type { AppSettings } from '../types/settings';
import type { Stage, WizardSessionView } from '../types/wizard';

export const API_BASE = import.meta.env.VITE_API_BASE ?? 'http://localhost:8787/api';

export class ApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string | null,
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

const readErrorBody = async (response: Response): Promise<{ error?: unknown; code?: unknown } | null> => {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return typeof parsed === 'object' && parsed !== null ? parsed : null;
  } catch (err) {
    console.warn('Error response was not JSON', err);
    return null;
  }
};

async function assertOk(response: Response): Promise<void> {
  if (response.ok) {
    return;
  }
  const parsed = await readErrorBody(response);
  const message = typeof parsed?.error === 'string' ? parsed.error : `Request failed with status ${response.status}`;
  const code = typeof parsed?.code === 'string' ? parsed.code : null;
  throw new ApiError(message, response.status, code);
}

async function handleResponse<T>(response: Response): Promise<T> {
  await assertOk(response);
  return (await response.json()) as T;
}

const postJson = (url: string, body?: unknown) =>
  fetch(url, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
    },
    body: JSON.stringify(body ?? {}),
  });

export async function startSession(): Promise<WizardSessionView> {
  return handleResponse<WizardSessionView>(await postJson(`${API_BASE}/session`));
}

export async function fetchSession(sessionId: string): Promise<WizardSessionView> {
  return handleResponse<WizardSessionView>(await fetch(`${API_BASE}/session/${sessionId}`));
}

export async function selectSport(sessionId: string, sport: string): Promise<WizardSessionView> {
  return handleResponse<WizardSessionView>(await postJson(`${API_BASE}/session/${sessionId}/sport`, { sport }));
}

export async function submitFilterRows(
  sessionId: string,
  rowIds: number[],
  confirm: boolean,
): Promise<WizardSessionView> {
  return handleResponse<WizardSessionView>(
    await postJson(`${API_BASE}/session/${sessionId}/filter`, { rowIds, confirm }),
  );
}

export async function setExtractionConfig(
  sessionId: string,
  oddsType: string | null,
  dropNaThreshold: number,
): Promise<WizardSessionView> {
  return handleResponse<WizardSessionView>(
    await postJson(`${API_BASE}/session/${sessionId}/extraction`, { oddsType, dropNaThreshold }),
  );
}

export async function advance(sessionId: string): Promise<WizardSessionView> {
  return handleResponse<WizardSessionView>(await postJson(`${API_BASE}/session/${sessionId}/advance`));
}

export async function rewind(sessionId: string, stage: Stage): Promise<WizardSessionView> {
  return handleResponse<WizardSessionView>(await postJson(`${API_BASE}/session/${sessionId}/rewind`, { stage }));
}

export async function resetSession(sessionId: string): Promise<WizardSessionView> {
  return handleResponse<WizardSessionView>(await postJson(`${API_BASE}/session/${sessionId}/reset`));
}

export interface DownloadedArchive {
  fileName: string;
  blob: Blob;
}

export async function exportLoader(sessionId: string): Promise<DownloadedArchive> {
  const response = await fetch(`${API_BASE}/session/${sessionId}/export`);
  await assertOk(response);
  const disposition = response.headers.get('content-disposition') ?? '';
  const match = /filename="?([^";]+)"?/i.exec(disposition);
  return {
    fileName: match?.[1] ?? 'dataloader',
    blob: await response.blob(),
  };
}

export const sessionEventsUrl = (sessionId: string) => `${API_BASE}/session/${sessionId}/events`;

export async function fetchSettings(): Promise<AppSettings> {
  const response = await fetch(`${API_BASE}/settings`);
  return handleResponse<AppSettings>(response);
}

export async function saveSettings(settings: AppSettings): Promise<AppSettings> {
  const response = await fetch(`${API_BASE}/settings`, {
    method: 'PUT',
    headers: {
      'Content-Type': 'application/json',
    },
    body: JSON.stringify(settings),
  });
  return handleResponse<AppSettings>(response);
}
