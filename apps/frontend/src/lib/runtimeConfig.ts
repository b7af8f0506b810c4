import { ViewerConfigSchema, type ViewerConfig } from '@chart-relay/api-contracts';

export type RuntimeConfig = ViewerConfig;

declare global {
  interface Window {
    __CHART_RELAY_RUNTIME_CONFIG__?: RuntimeConfig;
  }
}

let cachedConfig: RuntimeConfig | null = null;

function defaults(): RuntimeConfig {
  return ViewerConfigSchema.parse({});
}

function remember(config: RuntimeConfig): RuntimeConfig {
  cachedConfig = config;
  window.__CHART_RELAY_RUNTIME_CONFIG__ = config;
  return config;
}

/**
 * Loads `/config.json` once per page, unless the host page already injected
 * `window.__CHART_RELAY_RUNTIME_CONFIG__`. A missing, unreadable or invalid
 * file falls back to defaults so the viewer still starts.
 */
export async function loadRuntimeConfig(): Promise<RuntimeConfig> {
  if (cachedConfig) return cachedConfig;

  const injected = ViewerConfigSchema.safeParse(window.__CHART_RELAY_RUNTIME_CONFIG__);
  if (injected.success) return remember(injected.data);

  try {
    const res = await fetch('/config.json', { cache: 'no-store' });
    if (!res.ok) return remember(defaults());

    const parsed = ViewerConfigSchema.safeParse(await res.json());
    if (!parsed.success) {
      console.warn('Invalid /config.json, using defaults:', parsed.error.issues);
      return remember(defaults());
    }
    return remember(parsed.data);
  } catch {
    return remember(defaults());
  }
}
