import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
}

export interface StreamingConfig {
  segmentDuration: number; // seconds
  partDuration: number;    // seconds
  windowSize: number;      // segments kept in memory per stream
}

export interface CleanupConfig {
  enabled: boolean;
  idleTimeoutMinutes: number;
  intervalMinutes: number;
}

export interface ReportsConfig {
  enabled: boolean;
  path: string;
  intervalMinutes: number;
}

export interface AppConfig {
  server: ServerConfig;
  streaming: StreamingConfig;
  cleanup: CleanupConfig;
  reports: ReportsConfig;
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private config: AppConfig;
  private configPath: string;

  private constructor(configPath: string) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  public static getInstance(configPath?: string): ConfigLoader {
    if (!ConfigLoader.instance) {
      const defaultPath = path.join(process.cwd(), 'config.yaml');
      ConfigLoader.instance = new ConfigLoader(configPath || defaultPath);
    }
    return ConfigLoader.instance;
  }

  public static fromFile(configPath: string): ConfigLoader {
    return new ConfigLoader(configPath);
  }

  private loadConfig(): AppConfig {
    try {
      if (!fs.existsSync(this.configPath)) {
        console.warn(`Configuration file not found at ${this.configPath}, using default values`);
        const config = this.getDefaultConfig();
        this.applyEnvironmentOverrides(config);
        this.validateStreamingConfig(config);
        return config;
      }

      const fileContents = fs.readFileSync(this.configPath, 'utf8');
      const loaded = yaml.load(fileContents);
      const yamlConfig = (isRecord(loaded) ? loaded : {}) as DeepPartial<AppConfig>;

      const config = this.mergeWithDefaults(yamlConfig);

      this.applyEnvironmentOverrides(config);
      this.validateStreamingConfig(config);

      return config;
    } catch (error) {
      console.error(`Error loading configuration: ${error instanceof Error ? error.message : 'Unknown error'}`);
      return this.getDefaultConfig();
    }
  }

  private getDefaultConfig(): AppConfig {
    return {
      server: {
        port: 8080,
        host: '0.0.0.0',
        logLevel: 'info'
      },
      streaming: {
        segmentDuration: 6,
        partDuration: 1,
        windowSize: 5
      },
      cleanup: {
        enabled: true,
        idleTimeoutMinutes: 10,
        intervalMinutes: 1
      },
      reports: {
        enabled: false,
        path: path.join(process.cwd(), 'reports'),
        intervalMinutes: 5
      }
    };
  }

  private mergeWithDefaults(partialConfig: DeepPartial<AppConfig>): AppConfig {
    const defaults = this.getDefaultConfig();

    return {
      server: { ...defaults.server, ...pickDefined(partialConfig.server) },
      streaming: { ...defaults.streaming, ...pickDefined(partialConfig.streaming) },
      cleanup: { ...defaults.cleanup, ...pickDefined(partialConfig.cleanup) },
      reports: { ...defaults.reports, ...pickDefined(partialConfig.reports) }
    };
  }

  private applyEnvironmentOverrides(config: AppConfig): void {
    if (process.env.SERVER_PORT) {
      config.server.port = parseInt(process.env.SERVER_PORT, 10);
    }
    if (process.env.SERVER_HOST) {
      config.server.host = process.env.SERVER_HOST;
    }
    if (process.env.LOG_LEVEL) {
      config.server.logLevel = process.env.LOG_LEVEL;
    }

    if (process.env.SEGMENT_DURATION) {
      config.streaming.segmentDuration = parseFloat(process.env.SEGMENT_DURATION);
    }
    if (process.env.PART_DURATION) {
      config.streaming.partDuration = parseFloat(process.env.PART_DURATION);
    }
    if (process.env.WINDOW_SIZE) {
      config.streaming.windowSize = parseInt(process.env.WINDOW_SIZE, 10);
    }
  }

  // Parts must fit inside a segment and the window must hold at least one segment.
  private validateStreamingConfig(config: AppConfig): void {
    const defaults = this.getDefaultConfig().streaming;
    const streaming = config.streaming;

    if (!isPositive(streaming.segmentDuration) || !isPositive(streaming.partDuration)
      || streaming.partDuration > streaming.segmentDuration) {
      console.warn(
        `Invalid streaming durations (segment=${streaming.segmentDuration}, part=${streaming.partDuration}), using defaults`
      );
      streaming.segmentDuration = defaults.segmentDuration;
      streaming.partDuration = defaults.partDuration;
    }
    if (!Number.isInteger(streaming.windowSize) || streaming.windowSize < 1) {
      console.warn(`Invalid streaming.windowSize ${streaming.windowSize}, using ${defaults.windowSize}`);
      streaming.windowSize = defaults.windowSize;
    }
  }

  public getConfig(): AppConfig {
    return this.config;
  }

  public reloadConfig(): AppConfig {
    this.config = this.loadConfig();
    return this.config;
  }

  public getServerConfig(): ServerConfig {
    return this.config.server;
  }

  public getStreamingConfig(): StreamingConfig {
    return this.config.streaming;
  }

  public getCleanupConfig(): CleanupConfig {
    return this.config.cleanup;
  }

  public getReportsConfig(): ReportsConfig {
    return this.config.reports;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isPositive(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

function pickDefined<T extends object>(section: T | undefined): Partial<T> {
  if (!section || !isRecord(section)) {
    return {};
  }
  const result: Partial<T> = {};
  for (const key of Object.keys(section) as Array<keyof T>) {
    if (section[key] !== undefined && section[key] !== null) {
      result[key] = section[key];
    }
  }
  return result;
}
