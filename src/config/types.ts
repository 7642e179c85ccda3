export interface OutputDirs {
  transactions: string;
  lineups: string;
  athletesIndex: string;
  athletesById: string;
}

export interface AppConfig {
  leagueId?: string;
  startSeason: number;
  endSeason: number;
  fantasyHost: string;
  athletesUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  maxFetchAttempts: number;
  retryBackoffBase: number;
  retryUnitMs: number;
  minDelayMs: number;
  maxDelayMs: number;
  resume: boolean;
  maxScoringPeriod: number;
  indexPageSize: number;
  maxPages: number;
  outputDirs: OutputDirs;
  crawlLogPath: string;
  idQueuePath: string;
  missingIdsPath: string;
  missingQueuePath: string;
  debugPath: string;
  storePath: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs">> & {
  outputDirs?: Partial<OutputDirs>;
};
