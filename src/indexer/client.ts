import axios, { AxiosInstance } from 'axios';
import fs from 'fs';
import path from 'path';
import { config } from '../config';
import { logger } from '../services/structuredLogging';

export interface IndexerLanguage {
  abbreviation: string;
  name: string;
}

export interface LanguageSource {
  supportedLanguages(): Promise<Set<string>>;
}

const LANGUAGE_CACHE_MS = 60 * 60 * 1000;
const BUILTIN_LANGUAGES_PATH = path.join(__dirname, '../../data/languages.json');

function isIndexerLanguage(value: unknown): value is IndexerLanguage {
  return (
    typeof value === 'object' &&
    value !== null &&
    'abbreviation' in value &&
    typeof value.abbreviation === 'string' &&
    'name' in value &&
    typeof value.name === 'string'
  );
}

export function loadBuiltinLanguages(): IndexerLanguage[] {
  const raw: unknown = JSON.parse(fs.readFileSync(BUILTIN_LANGUAGES_PATH, 'utf-8'));
  return Array.isArray(raw) ? raw.filter(isIndexerLanguage) : [];
}

export class IndexerClient implements LanguageSource {
  private client: AxiosInstance | null = null;
  private token: string | null = null;
  private cache: { expiresAt: number; languages: IndexerLanguage[] } | null = null;

  constructor(
    private readonly apiUrl: string = config.indexer.apiUrl,
    private readonly apiKey: string = config.indexer.apiKey,
    private readonly timeoutMs: number = config.ioTimeoutMs
  ) {
    if (this.apiUrl) {
      this.client = axios.create({
        baseURL: this.apiUrl,
        timeout: this.timeoutMs,
      });
    }
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  private async ensureToken(client: AxiosInstance): Promise<string | null> {
    if (!this.apiKey) return null;
    if (this.token) return this.token;

    const response = await client.post('/login', { apikey: this.apiKey });
    const token: unknown = response.data?.token;
    if (typeof token !== 'string') {
      throw new Error('Indexer login did not return a token');
    }
    this.token = token;
    return token;
  }

  private async fetchLanguages(client: AxiosInstance): Promise<IndexerLanguage[]> {
    const token = await this.ensureToken(client);
    const response = await client.get('/languages', {
      headers: token ? { Authorization: `Bearer ${token}` } : undefined,
    });
    const data: unknown = response.data?.data;
    const languages = Array.isArray(data) ? data.filter(isIndexerLanguage) : [];
    if (languages.length === 0) {
      throw new Error('Indexer returned no languages');
    }
    return languages;
  }

  async getLanguages(): Promise<IndexerLanguage[]> {
    if (this.cache && this.cache.expiresAt > Date.now()) {
      return this.cache.languages;
    }

    let languages: IndexerLanguage[];
    if (this.client) {
      try {
        languages = await this.fetchLanguages(this.client);
      } catch (error) {
        // Drop the token in case it expired; the next lookup logs in again
        this.token = null;
        logger.warn('indexer', 'Language lookup failed, using built-in list', {
          details: { error: error instanceof Error ? error.message : String(error) },
        });
        return loadBuiltinLanguages();
      }
    } else {
      languages = loadBuiltinLanguages();
    }

    this.cache = { expiresAt: Date.now() + LANGUAGE_CACHE_MS, languages };
    return languages;
  }

  async supportedLanguages(): Promise<Set<string>> {
    const languages = await this.getLanguages();
    return new Set(languages.map((language) => language.abbreviation));
  }
}

const indexerClient = new IndexerClient();

export default indexerClient;
