import type { PricePolicy } from '../types/estimate';

export interface AppConfig {
  estimateApiUrl: string;
  exportTimeoutMs: number;
  pricePolicy: PricePolicy;
}

export const DEFAULT_EXPORT_TIMEOUT_MS = 60_000;

export interface RawEnv {
  VITE_ESTIMATE_API_URL?: string;
  VITE_EXPORT_TIMEOUT_MS?: string;
  VITE_PRICE_POLICY?: string;
}

/** Invalid values fall back to defaults. */
export function readConfig(env: RawEnv): AppConfig {
  const timeout = Number(env.VITE_EXPORT_TIMEOUT_MS);
  const policy = env.VITE_PRICE_POLICY?.trim().toLowerCase();

  return {
    estimateApiUrl: (env.VITE_ESTIMATE_API_URL ?? '').trim().replace(/\/+$/, ''),
    exportTimeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_EXPORT_TIMEOUT_MS,
    pricePolicy: policy === 'reset' ? 'reset' : 'preserve',
  };
}

export const config: AppConfig = readConfig(import.meta.env);
