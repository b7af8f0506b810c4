import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';

import App from '@/App';
import './i18n/config';
import './index.css';
import { setApiBaseUrl } from '@/lib/api';
import { loadRuntimeConfig } from '@/lib/runtimeConfig';

// No console noise in production; console.error stays for real issues.
if (import.meta.env.PROD) {
  console.log = () => {};
  console.info = () => {};
  console.debug = () => {};
}

async function bootstrap() {
  const rootElement = document.getElementById('root');
  if (!rootElement) {
    throw new Error('Root element not found');
  }

  const cfg = await loadRuntimeConfig();
  if (cfg.apiBaseUrl !== undefined) {
    // "" means same-origin relative requests
    setApiBaseUrl(cfg.apiBaseUrl);
  }

  createRoot(rootElement).render(
    <StrictMode>
      <App pollIntervalMs={cfg.pollIntervalMs} />
    </StrictMode>,
  );
}

bootstrap().catch((error: unknown) => {
  console.error('Viewer failed to start:', error);
});
