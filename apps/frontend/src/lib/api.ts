import axios, { type AxiosInstance } from 'axios';
import { REQUEST_ID_HEADER } from '@chart-relay/api-contracts';

function getDefaultApiBaseUrl(): string {
  // Production builds talk to the same origin unless /config.json says otherwise.
  if (import.meta.env.PROD) return '';
  return import.meta.env.VITE_API_URL || 'http://localhost:3001';
}

export const api: AxiosInstance = axios.create({
  baseURL: getDefaultApiBaseUrl(),
  timeout: 15000,
});

/**
 * Override API baseURL at runtime (used for runtime config).
 * "" means same-origin relative requests.
 */
export function setApiBaseUrl(baseURL: string): void {
  api.defaults.baseURL = baseURL;
}

export function getRequestIdFromError(error: unknown): string | null {
  if (!axios.isAxiosError(error)) return null;
  const value = error.response?.headers?.[REQUEST_ID_HEADER];
  if (typeof value === 'string' && value.trim()) return value.trim();
  return null;
}
