export type UnknownBookPolicy = "lenient" | "strict";

export interface VerseBotConfig {
  readonly matrix: MatrixConfig;
  readonly bot: BotConfig;
  readonly apiKeys: ApiKeysConfig;
  readonly logging: LoggingConfig;
}

export interface MatrixConfig {
  readonly homeserver?: string;
  readonly userId?: string;
  readonly rooms: string[];
  readonly e2ee: E2eeConfig;
}

export interface E2eeConfig {
  readonly enabled: boolean;
}

export interface BotConfig {
  readonly defaultTranslation: string;
  readonly cacheEnabled: boolean;
  readonly cacheMaxEntries: number;
  readonly cacheTtlMs: number;
  readonly maxMessageLength: number;
  readonly splitMessageLength: number;
  readonly preservePoetryFormatting: boolean;
  readonly detectReferencesAnywhere: boolean;
  readonly unknownBookPolicy: UnknownBookPolicy;
  readonly requestTimeoutMs: number;
}

export interface ApiKeysConfig {
  readonly esv?: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
