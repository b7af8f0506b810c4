import { useTranslation } from 'react-i18next';

import { ResourceViewer } from '@/features/resource-viewer/ui/ResourceViewer';

export type AppProps = {
  pollIntervalMs?: number;
};

function App({ pollIntervalMs }: AppProps) {
  const { t } = useTranslation();

  return (
    <main className="app">
      <h1 className="app__title">{t('app.title')}</h1>
      <ResourceViewer intervalMs={pollIntervalMs} />
    </main>
  );
}

export default App;
