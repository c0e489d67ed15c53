import axios, { AxiosError, type AxiosResponse, type InternalAxiosRequestConfig } from 'axios';
import { describe, expect, it } from 'vitest';
import { ProviderError } from '@transjson/translation';
import { createTranslator, readWebTranslation } from './index.js';

type Responder = (config: InternalAxiosRequestConfig) => unknown;

function createHttp(respond: Responder, requests: InternalAxiosRequestConfig[] = []) {
  return axios.create({
    adapter: async (config): Promise<AxiosResponse> => {
      requests.push(config);
      return { data: respond(config), status: 200, statusText: 'OK', headers: {}, config };
    },
  });
}

function failingHttp(status: number) {
  return axios.create({
    adapter: async (config): Promise<AxiosResponse> => {
      const response: AxiosResponse = { data: {}, status, statusText: 'Error', headers: {}, config };
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, undefined, response);
    },
  });
}

describe('translator-google', () => {
  it('joins translated segments from the web endpoint', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const http = createHttp(() => [[['Hola, ', 'Hello, '], ['mundo', 'world']], null, 'en'], requests);
    const translator = createTranslator({ provider: 'google', http });

    await expect(translator.translate('Hello, world', 'en', 'es')).resolves.toBe('Hola, mundo');
    expect(requests[0].params).toEqual({ client: 'gtx', sl: 'en', tl: 'es', dt: 't', q: 'Hello, world' });
  });

  it('detects the source language through the web endpoint', async () => {
    const http = createHttp(() => [[['Hello', 'Bonjour']], null, 'fr']);
    const translator = createTranslator({ provider: 'google', http });

    await expect(translator.detectLanguage(['Bonjour', 'le monde'])).resolves.toBe('fr');
    await expect(translator.detectLanguage(['   '])).resolves.toBeUndefined();
  });

  it('uses the cloud API when an API key is configured', async () => {
    const requests: InternalAxiosRequestConfig[] = [];
    const http = createHttp((config) => {
      if (config.url?.endsWith('/detect')) {
        return { data: { detections: [[{ language: 'de', confidence: 0.2 }]] } };
      }
      return { data: { translations: [{ translatedText: 'Guten Tag' }] } };
    }, requests);
    const translator = createTranslator({ provider: 'google', apiKey: 'test-secret', http });

    await expect(translator.translate('Good day', 'en', 'de')).resolves.toBe('Guten Tag');
    expect(requests[0].params).toEqual({ key: 'test-secret' });
    await expect(translator.detectLanguage(['Guten Tag'])).resolves.toBeUndefined();
  });

  it('maps rate limiting to a retryable provider error', async () => {
    const translator = createTranslator({ provider: 'google', http: failingHttp(429) });
    const failure = await translator.translate('Hello', 'en', 'es').catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ProviderError);
    expect(failure).toMatchObject({ status: 429, retryable: true, provider: 'google' });
  });

  it('treats rejected keys as non-retryable', async () => {
    const translator = createTranslator({ provider: 'google', apiKey: 'test-secret', http: failingHttp(403) });
    await expect(translator.translate('Hello', 'en', 'es')).rejects.toMatchObject({ retryable: false, status: 403 });
  });

  it('returns undefined for malformed web payloads', () => {
    expect(readWebTranslation({})).toBeUndefined();
    expect(readWebTranslation([[]])).toBeUndefined();
  });
});
