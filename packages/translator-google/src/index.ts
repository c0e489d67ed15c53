/**
 * Google Translate provider.
 *
 * With an API key the Cloud Translation v2 REST API is used; without one the
 * public web endpoint is queried. Each translator owns its own axios instance.
 */

import axios, { type AxiosInstance } from 'axios';
import { ProviderError, type Translator, type TranslatorFactoryOptions } from '@transjson/translation';

const CLOUD_BASE_URL = 'https://translation.googleapis.com/language/translate/v2';
const WEB_BASE_URL = 'https://translate.googleapis.com/translate_a/single';
const DEFAULT_TIMEOUT_MS = 10000;
const MIN_DETECTION_CONFIDENCE = 0.5;
const PROVIDER = 'google';

export interface GoogleTranslatorOptions extends TranslatorFactoryOptions {
  http?: AxiosInstance;
}

export function createTranslator(options: GoogleTranslatorOptions): Translator {
  const apiKey = options.apiKey ?? options.secret;
  const http = options.http ?? axios.create({ timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS });

  return apiKey ? createCloudTranslator(http, apiKey) : createWebTranslator(http);
}

function createCloudTranslator(http: AxiosInstance, apiKey: string): Translator {
  return {
    name: PROVIDER,
    async translate(text: string, sourceLanguage: string, targetLanguage: string): Promise<string> {
      const data = await request(() =>
        http.post<unknown>(
          CLOUD_BASE_URL,
          { q: text, source: sourceLanguage, target: targetLanguage, format: 'text' },
          { params: { key: apiKey } }
        )
      );
      const translated = readCloudTranslation(data);
      if (translated === undefined) {
        throw new ProviderError('Invalid response from Google Cloud Translation', { provider: PROVIDER, retryable: false });
      }
      return translated;
    },
    async detectLanguage(samples: string[]): Promise<string | undefined> {
      const text = samples.join(' ').trim();
      if (!text) {
        return undefined;
      }
      try {
        const data = await request(() => http.post<unknown>(`${CLOUD_BASE_URL}/detect`, { q: text }, { params: { key: apiKey } }));
        const detection = readCloudDetection(data);
        if (!detection || detection.confidence < MIN_DETECTION_CONFIDENCE) {
          return undefined;
        }
        return detection.language;
      } catch (error) {
        if (error instanceof ProviderError) {
          return undefined;
        }
        throw error;
      }
    },
  };
}

function createWebTranslator(http: AxiosInstance): Translator {
  const query = async (text: string, sourceLanguage: string, targetLanguage: string): Promise<unknown> =>
    request(() =>
      http.get<unknown>(WEB_BASE_URL, {
        params: { client: 'gtx', sl: sourceLanguage, tl: targetLanguage, dt: 't', q: text },
      })
    );

  return {
    name: PROVIDER,
    async translate(text: string, sourceLanguage: string, targetLanguage: string): Promise<string> {
      const data = await query(text, sourceLanguage, targetLanguage);
      const translated = readWebTranslation(data);
      if (translated === undefined) {
        throw new ProviderError('Invalid response from Google Translate', { provider: PROVIDER, retryable: false });
      }
      return translated;
    },
    async detectLanguage(samples: string[]): Promise<string | undefined> {
      const text = samples.join(' ').trim();
      if (!text) {
        return undefined;
      }
      try {
        const data = await query(text, 'auto', 'en');
        return Array.isArray(data) && typeof data[2] === 'string' ? data[2] : undefined;
      } catch (error) {
        if (error instanceof ProviderError) {
          return undefined;
        }
        throw error;
      }
    },
  };
}

async function request(send: () => Promise<{ data: unknown }>): Promise<unknown> {
  try {
    const response = await send();
    return response.data;
  } catch (error) {
    throw toProviderError(error);
  }
}

export function toProviderError(error: unknown): ProviderError {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      switch (status) {
        case 401:
        case 403:
          return new ProviderError('Google API key is invalid or expired', { provider: PROVIDER, status, retryable: false, cause: error });
        case 429:
          return new ProviderError('Google rate limit exceeded. Please try again later.', { provider: PROVIDER, status, cause: error });
        case 500:
        case 503:
          return new ProviderError('Google service temporarily unavailable', { provider: PROVIDER, status, cause: error });
        default:
          return new ProviderError(`Google error: ${status}`, { provider: PROVIDER, status, retryable: status >= 500, cause: error });
      }
    }
    return new ProviderError('Network error: Unable to reach Google Translate', { provider: PROVIDER, cause: error });
  }

  const message = error instanceof Error ? error.message : 'Unknown translation error';
  return new ProviderError(message, { provider: PROVIDER, cause: error });
}

/**
 * The web endpoint answers with nested arrays; the first element lists
 * `[translatedChunk, sourceChunk, ...]` segments.
 */
export function readWebTranslation(data: unknown): string | undefined {
  if (!Array.isArray(data) || !Array.isArray(data[0])) {
    return undefined;
  }
  const segments: unknown[] = data[0];
  const parts: string[] = [];
  for (const segment of segments) {
    if (Array.isArray(segment) && typeof segment[0] === 'string') {
      parts.push(segment[0]);
    }
  }
  return parts.length ? parts.join('') : undefined;
}

function readCloudTranslation(data: unknown): string | undefined {
  const translations = readPath(data, ['data', 'translations']);
  if (!Array.isArray(translations)) {
    return undefined;
  }
  const text = readPath(translations[0], ['translatedText']);
  return typeof text === 'string' ? text : undefined;
}

function readCloudDetection(data: unknown): { language: string; confidence: number } | undefined {
  const detections = readPath(data, ['data', 'detections']);
  if (!Array.isArray(detections) || !Array.isArray(detections[0])) {
    return undefined;
  }
  const best: unknown = detections[0][0];
  const language = readPath(best, ['language']);
  const confidence = readPath(best, ['confidence']);
  if (typeof language !== 'string' || language === 'und') {
    return undefined;
  }
  return { language, confidence: typeof confidence === 'number' ? confidence : 1 };
}

function readPath(value: unknown, segments: string[]): unknown {
  let current = value;
  for (const segment of segments) {
    if (!current || typeof current !== 'object' || !(segment in current)) {
      return undefined;
    }
    const next: unknown = Reflect.get(current, segment);
    current = next;
  }
  return current;
}

export default {
  createTranslator,
};
