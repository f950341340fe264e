export interface AppSettings {
  loaderServiceUrl: string | null;
  defaultDropNaThreshold: number;
  maxPreviewRows: number;
}

export const defaultSettings: AppSettings = {
  loaderServiceUrl: null,
  defaultDropNaThreshold: 0,
  maxPreviewRows: 10000,
};
