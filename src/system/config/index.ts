/**
 * Configuration Management Module
 *
 * Builds the radar configuration from defaults, an optional YAML file and
 * environment variables (in that order of precedence, last one wins).
 */

import fs from 'fs';
import { load } from 'js-yaml';
import * as cron from 'node-cron';
import { LogLevel, parseLogLevel } from '../../collection/utils/logger';
import { validateUrl } from '../../collection/validator';
import { EnvLoader } from './env';

export type LLMProvider = 'openai' | 'anthropic';

export interface DatabaseSettings {
  path: string;
}

export interface AdsIntelSettings {
  baseUrl: string;
  startUrl: string;
  sessionCookie?: string;
  productsPerRun: number;
  videosPerProduct: number;
  maxCards: number;
}

export interface VendorSettings {
  baseUrl: string;
  apiKey?: string;
  region: string;
  period: number;
  limit: number;
}

export interface DouyinSettings {
  enabled: boolean;
  baseUrl: string;
  sessionCookie?: string;
  /** Hashtag bank categories searched in turn */
  categories: string[];
  target: number;
  maxKeywords: number;
}

export interface FilterSettings {
  minImpressions: number;
  priorityImpressions: number;
  daysBack: number;
}

export interface HttpSettings {
  timeout: number; // milliseconds
  delayMin: number; // milliseconds
  delayMax: number; // milliseconds
  maxRetries: number;
  retryDelayBase: number; // milliseconds
}

export interface LLMSettings {
  enabled: boolean;
  provider: LLMProvider;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  temperature: number;
  maxTokens: number;
}

export interface EmbeddingSettings {
  model: string;
  apiKey?: string;
}

export interface BrandSettings {
  profilePath: string;
}

export interface ReportSettings {
  outputDir: string;
  topN: number;
  analyzeTop: number;
  /** Translate product names, hooks and offers into this language (e.g. "English"); unset keeps the source text */
  language?: string;
}

export interface SchedulerSettings {
  cronExpression: string;
  timezone?: string;
}

export interface EmailSettings {
  enabled: boolean;
  smtpHost: string;
  smtpPort: number;
  smtpSecure: boolean;
  smtpUser: string;
  smtpPass: string;
  recipient: string;
  sender?: string;
}

export interface NotificationSettings {
  email: EmailSettings;
}

export interface RadarConfig {
  database: DatabaseSettings;
  adsIntel: AdsIntelSettings;
  vendor: VendorSettings;
  douyin: DouyinSettings;
  filters: FilterSettings;
  http: HttpSettings;
  llm: LLMSettings;
  embedding: EmbeddingSettings;
  brand: BrandSettings;
  report: ReportSettings;
  scheduler: SchedulerSettings;
  notification: NotificationSettings;
  logLevel: LogLevel;
  logDir: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface ConfigManagerOptions {
  /** YAML file, defaults to ./config/radar.config.yaml */
  configPath?: string;
  /** Environment source, defaults to process.env after loading .env files */
  env?: Record<string, string | undefined>;
}

export const DEFAULT_CONFIG_PATH = './config/radar.config.yaml';

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: Section, key: string): Section {
  const value = source[key];
  return isSection(value) ? value : {};
}

function str(source: Section, key: string, fallback: string): string {
  const value = source[key];
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  return fallback;
}

function optionalStr(source: Section, key: string, fallback?: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value !== '' ? value : fallback;
}

function num(source: Section, key: string, fallback: number): number {
  const value = source[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '' && !isNaN(Number(value))) {
    return Number(value);
  }
  return fallback;
}

function strList(source: Section, key: string, fallback: string[]): string[] {
  const value = source[key];
  const items = Array.isArray(value)
    ? value.filter((item): item is string => typeof item === 'string')
    : typeof value === 'string'
      ? value.split(',')
      : null;
  if (!items) {
    return fallback;
  }
  const cleaned = items.map(item => item.trim()).filter(item => item !== '');
  return cleaned.length > 0 ? cleaned : fallback;
}

function bool(source: Section, key: string, fallback: boolean): boolean {
  const value = source[key];
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    return ['true', '1', 'yes'].includes(value.toLowerCase());
  }
  return fallback;
}

function provider(value: unknown, fallback: LLMProvider): LLMProvider {
  return value === 'openai' || value === 'anthropic' ? value : fallback;
}

/**
 * Masks a secret for display, keeping a short prefix of long values
 */
export function maskSecret(value: string | undefined): string | undefined {
  if (!value) {
    return value;
  }
  return value.length <= 8 ? '****' : `${value.slice(0, 4)}****`;
}

export class ConfigManager {
  private config: RadarConfig;
  private configPath: string;
  private env: Record<string, string | undefined>;

  constructor(options: ConfigManagerOptions = {}) {
    this.configPath = options.configPath || DEFAULT_CONFIG_PATH;
    if (options.env) {
      this.env = options.env;
    } else {
      EnvLoader.initialize();
      this.env = process.env;
    }
    this.config = this.loadConfig();
  }

  /**
   * Get the complete configuration
   */
  getConfig(): RadarConfig {
    return structuredClone(this.config);
  }

  /**
   * Get the configuration with API keys, cookies and passwords masked
   */
  getMaskedConfig(): RadarConfig {
    const masked = this.getConfig();
    masked.adsIntel.sessionCookie = maskSecret(masked.adsIntel.sessionCookie);
    masked.vendor.apiKey = maskSecret(masked.vendor.apiKey);
    masked.douyin.sessionCookie = maskSecret(masked.douyin.sessionCookie);
    masked.llm.apiKey = maskSecret(masked.llm.apiKey);
    masked.embedding.apiKey = maskSecret(masked.embedding.apiKey);
    masked.notification.email.smtpPass = maskSecret(masked.notification.email.smtpPass) ?? '';
    return masked;
  }

  /**
   * Update configuration sections
   */
  updateConfig(updates: Partial<RadarConfig>): void {
    this.config = {
      ...this.config,
      ...updates
    };
  }

  /**
   * Reload configuration from file and environment
   */
  reload(): void {
    this.config = this.loadConfig();
  }

  /**
   * Validate configuration
   */
  validateConfig(): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];
    const { database, adsIntel, vendor, douyin, filters, http, llm, report, scheduler, notification } = this.config;

    if (!database.path) {
      errors.push('Database path is required');
    }

    if (adsIntel.startUrl && !validateUrl(adsIntel.startUrl)) {
      errors.push(`Ads intelligence start URL is invalid: ${adsIntel.startUrl}`);
    }
    if (adsIntel.productsPerRun <= 0 || adsIntel.videosPerProduct <= 0) {
      errors.push('Ads intelligence product and video counts must be positive');
    }

    if (vendor.apiKey && !validateUrl(vendor.baseUrl)) {
      errors.push('Vendor base URL is required when a vendor API key is set');
    }

    if (douyin.enabled) {
      if (!validateUrl(douyin.baseUrl)) {
        errors.push(`Douyin base URL is invalid: ${douyin.baseUrl}`);
      }
      if (douyin.target <= 0 || douyin.maxKeywords <= 0) {
        errors.push('Douyin target and keyword count must be positive');
      }
      if (!douyin.sessionCookie) {
        warnings.push('Douyin session cookie is not set; search pages usually require a logged-in session');
      }
    }

    if (filters.minImpressions < 0) {
      errors.push('Minimum impressions must not be negative');
    }
    if (filters.priorityImpressions < filters.minImpressions) {
      errors.push('Priority impressions must be at least the minimum impressions');
    }
    if (filters.daysBack <= 0) {
      errors.push('Days back must be positive');
    }

    if (http.delayMin > http.delayMax) {
      errors.push('HTTP minimum delay must not exceed the maximum delay');
    }
    if (http.maxRetries < 0) {
      errors.push('HTTP max retries must not be negative');
    }

    if (llm.temperature < 0 || llm.temperature > 2) {
      errors.push('LLM temperature must be between 0 and 2');
    }
    if (llm.enabled && !llm.apiKey) {
      warnings.push('LLM API key is not set; brand-fit and creative analysis will be skipped');
    }

    if (report.topN <= 0) {
      errors.push('Report top N must be positive');
    }

    if (!cron.validate(scheduler.cronExpression)) {
      errors.push(`Invalid cron expression: ${scheduler.cronExpression}`);
    }

    if (notification.email.enabled) {
      if (!notification.email.smtpHost) {
        errors.push('SMTP host is required when email notifications are enabled');
      }
      if (!notification.email.smtpUser) {
        errors.push('SMTP user is required when email notifications are enabled');
      }
      if (!notification.email.recipient) {
        errors.push('Alert recipient is required when email notifications are enabled');
      }
    }

    return { valid: errors.length === 0, errors, warnings };
  }

  /**
   * Load configuration from defaults, file and environment variables
   */
  private loadConfig(): RadarConfig {
    const fileConfig = this.loadFileConfig();
    const merged = this.fromSource(fileConfig, ConfigManager.defaults());
    return this.applyEnvironmentOverrides(merged);
  }

  /**
   * Load configuration from YAML file
   */
  private loadFileConfig(): Section {
    if (!fs.existsSync(this.configPath)) {
      return {};
    }

    try {
      const parsed = load(fs.readFileSync(this.configPath, 'utf-8'));
      return isSection(parsed) ? parsed : {};
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Failed to load configuration file ${this.configPath}: ${message}`);
      return {};
    }
  }

  /**
   * Read typed sections from an untyped source, falling back to the base values
   */
  private fromSource(source: Section, base: RadarConfig): RadarConfig {
    const database = section(source, 'database');
    const adsIntel = section(source, 'adsIntel');
    const vendor = section(source, 'vendor');
    const douyin = section(source, 'douyin');
    const filters = section(source, 'filters');
    const http = section(source, 'http');
    const llm = section(source, 'llm');
    const embedding = section(source, 'embedding');
    const brand = section(source, 'brand');
    const report = section(source, 'report');
    const scheduler = section(source, 'scheduler');
    const email = section(section(source, 'notification'), 'email');

    return {
      database: {
        path: str(database, 'path', base.database.path)
      },
      adsIntel: {
        baseUrl: str(adsIntel, 'baseUrl', base.adsIntel.baseUrl),
        startUrl: str(adsIntel, 'startUrl', base.adsIntel.startUrl),
        sessionCookie: optionalStr(adsIntel, 'sessionCookie', base.adsIntel.sessionCookie),
        productsPerRun: num(adsIntel, 'productsPerRun', base.adsIntel.productsPerRun),
        videosPerProduct: num(adsIntel, 'videosPerProduct', base.adsIntel.videosPerProduct),
        maxCards: num(adsIntel, 'maxCards', base.adsIntel.maxCards)
      },
      vendor: {
        baseUrl: str(vendor, 'baseUrl', base.vendor.baseUrl),
        apiKey: optionalStr(vendor, 'apiKey', base.vendor.apiKey),
        region: str(vendor, 'region', base.vendor.region),
        period: num(vendor, 'period', base.vendor.period),
        limit: num(vendor, 'limit', base.vendor.limit)
      },
      douyin: {
        enabled: bool(douyin, 'enabled', base.douyin.enabled),
        baseUrl: str(douyin, 'baseUrl', base.douyin.baseUrl),
        sessionCookie: optionalStr(douyin, 'sessionCookie', base.douyin.sessionCookie),
        categories: strList(douyin, 'categories', base.douyin.categories),
        target: num(douyin, 'target', base.douyin.target),
        maxKeywords: num(douyin, 'maxKeywords', base.douyin.maxKeywords)
      },
      filters: {
        minImpressions: num(filters, 'minImpressions', base.filters.minImpressions),
        priorityImpressions: num(filters, 'priorityImpressions', base.filters.priorityImpressions),
        daysBack: num(filters, 'daysBack', base.filters.daysBack)
      },
      http: {
        timeout: num(http, 'timeout', base.http.timeout),
        delayMin: num(http, 'delayMin', base.http.delayMin),
        delayMax: num(http, 'delayMax', base.http.delayMax),
        maxRetries: num(http, 'maxRetries', base.http.maxRetries),
        retryDelayBase: num(http, 'retryDelayBase', base.http.retryDelayBase)
      },
      llm: {
        enabled: bool(llm, 'enabled', base.llm.enabled),
        provider: provider(llm.provider, base.llm.provider),
        model: str(llm, 'model', base.llm.model),
        apiKey: optionalStr(llm, 'apiKey', base.llm.apiKey),
        baseUrl: optionalStr(llm, 'baseUrl', base.llm.baseUrl),
        temperature: num(llm, 'temperature', base.llm.temperature),
        maxTokens: num(llm, 'maxTokens', base.llm.maxTokens)
      },
      embedding: {
        model: str(embedding, 'model', base.embedding.model),
        apiKey: optionalStr(embedding, 'apiKey', base.embedding.apiKey)
      },
      brand: {
        profilePath: str(brand, 'profilePath', base.brand.profilePath)
      },
      report: {
        outputDir: str(report, 'outputDir', base.report.outputDir),
        topN: num(report, 'topN', base.report.topN),
        analyzeTop: num(report, 'analyzeTop', base.report.analyzeTop),
        language: optionalStr(report, 'language', base.report.language)
      },
      scheduler: {
        cronExpression: str(scheduler, 'cronExpression', base.scheduler.cronExpression),
        timezone: optionalStr(scheduler, 'timezone', base.scheduler.timezone)
      },
      notification: {
        email: {
          enabled: bool(email, 'enabled', base.notification.email.enabled),
          smtpHost: str(email, 'smtpHost', base.notification.email.smtpHost),
          smtpPort: num(email, 'smtpPort', base.notification.email.smtpPort),
          smtpSecure: bool(email, 'smtpSecure', base.notification.email.smtpSecure),
          smtpUser: str(email, 'smtpUser', base.notification.email.smtpUser),
          smtpPass: str(email, 'smtpPass', base.notification.email.smtpPass),
          recipient: str(email, 'recipient', base.notification.email.recipient),
          sender: optionalStr(email, 'sender', base.notification.email.sender)
        }
      },
      logLevel: parseLogLevel(optionalStr(source, 'logLevel')) ?? base.logLevel,
      logDir: str(source, 'logDir', base.logDir)
    };
  }

  /**
   * Apply environment variable overrides
   */
  private applyEnvironmentOverrides(config: RadarConfig): RadarConfig {
    const env = (key: string): string | undefined => {
      const value = this.env[key];
      return value === undefined || value === '' ? undefined : value;
    };

    const llmProvider = provider(env('LLM_PROVIDER'), config.llm.provider);
    const providerKey = llmProvider === 'anthropic' ? env('ANTHROPIC_API_KEY') : env('OPENAI_API_KEY');

    // Environment variables are mapped onto the same shape the YAML file uses
    const overrides: Section = {
      database: { path: env('DATABASE_PATH') },
      adsIntel: {
        baseUrl: env('ADS_INTEL_BASE_URL'),
        startUrl: env('ADS_INTEL_START_URL'),
        sessionCookie: env('ADS_INTEL_SESSION_COOKIE')
      },
      vendor: {
        baseUrl: env('VENDOR_BASE_URL'),
        apiKey: env('VENDOR_API_KEY'),
        region: env('VENDOR_REGION')
      },
      douyin: {
        enabled: env('DOUYIN_ENABLED'),
        sessionCookie: env('DOUYIN_SESSION_COOKIE'),
        categories: env('DOUYIN_CATEGORIES')
      },
      filters: {
        minImpressions: env('MIN_IMPRESSIONS'),
        priorityImpressions: env('PRIORITY_IMPRESSIONS'),
        daysBack: env('DAYS_BACK')
      },
      http: {
        timeout: env('HTTP_TIMEOUT'),
        maxRetries: env('MAX_RETRIES'),
        retryDelayBase: env('RETRY_DELAY_BASE')
      },
      llm: {
        enabled: env('LLM_ENABLED'),
        provider: llmProvider,
        model: env('LLM_MODEL'),
        apiKey: env('LLM_API_KEY') ?? providerKey,
        baseUrl: env('LLM_BASE_URL'),
        temperature: env('LLM_TEMPERATURE'),
        maxTokens: env('LLM_MAX_TOKENS')
      },
      embedding: {
        model: env('EMBEDDING_MODEL'),
        apiKey: env('OPENAI_API_KEY')
      },
      brand: { profilePath: env('BRAND_PROFILE_PATH') },
      report: {
        outputDir: env('REPORT_DIR'),
        topN: env('REPORT_TOP_N'),
        language: env('REPORT_LANGUAGE')
      },
      scheduler: {
        cronExpression: env('RADAR_CRON'),
        timezone: env('RADAR_TIMEZONE')
      },
      notification: {
        email: {
          enabled: env('EMAIL_ENABLED'),
          smtpHost: env('SMTP_HOST'),
          smtpPort: env('SMTP_PORT'),
          smtpUser: env('SMTP_USER'),
          smtpPass: env('SMTP_PASS'),
          recipient: env('ALERT_EMAIL')
        }
      },
      logLevel: env('LOG_LEVEL'),
      logDir: env('LOG_DIR')
    };

    return this.fromSource(overrides, config);
  }

  /**
   * Default configuration
   */
  static defaults(): RadarConfig {
    return {
      database: {
        path: './data/radar.db'
      },
      adsIntel: {
        baseUrl: 'https://www.pipiads.com',
        startUrl: '',
        productsPerRun: 5,
        videosPerProduct: 3,
        maxCards: 15
      },
      vendor: {
        baseUrl: '',
        region: 'US',
        period: 7,
        limit: 20
      },
      douyin: {
        enabled: false,
        baseUrl: 'https://www.douyin.com',
        categories: ['face', 'hair', 'body', 'makeup'],
        target: 25,
        maxKeywords: 8
      },
      filters: {
        minImpressions: 5000,
        priorityImpressions: 100000,
        daysBack: 30
      },
      http: {
        timeout: 30000, // 30 seconds
        delayMin: 2000,
        delayMax: 5000,
        maxRetries: 3,
        retryDelayBase: 2000
      },
      llm: {
        enabled: true,
        provider: 'openai',
        model: 'gpt-4o-mini',
        temperature: 0.3,
        maxTokens: 2000
      },
      embedding: {
        model: 'text-embedding-3-small'
      },
      brand: {
        profilePath: './config/brand-profile.yaml'
      },
      report: {
        outputDir: './reports',
        topN: 10,
        analyzeTop: 10
      },
      scheduler: {
        cronExpression: '0 9 * * 1' // Mondays at 09:00
      },
      notification: {
        email: {
          enabled: false,
          smtpHost: '',
          smtpPort: 587,
          smtpSecure: false,
          smtpUser: '',
          smtpPass: '',
          recipient: ''
        }
      },
      logLevel: LogLevel.INFO,
      logDir: './logs'
    };
  }
}
