export interface EngineConfig {
  ytDlpPath: string;
  retries: number;
  fragmentRetries: number;
  concurrentFragments: number;
  socketTimeout: number;
}

export interface AppConfig {
  ffmpegPath: string;
  engine: EngineConfig;
  ledgerFile: string;
  settingsFile: string;
  cookiesFile?: string;
  thumbnailTimeout: number;
  coolOffEvery: number;
  coolOffMaxMs: number;
  resolveRetries: number;
  watchUrlTemplate: string;
}
