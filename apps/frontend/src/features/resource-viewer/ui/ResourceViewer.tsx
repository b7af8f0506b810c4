import { useTranslation } from 'react-i18next';

import { useResourcePolling } from '../model/useResourcePolling';

export type ResourceViewerProps = {
  intervalMs?: number;
  alt?: string;
};

export function ResourceViewer({ intervalMs, alt }: ResourceViewerProps) {
  const { t } = useTranslation();
  const { status, src, error, lastUpdatedAt, refresh } = useResourcePolling({ intervalMs });

  return (
    <figure className="resource-viewer" aria-busy={src === null}>
      {src ? (
        <img className="resource-viewer__image" src={src} alt={alt ?? t('viewer.imageAlt')} />
      ) : (
        <div className="resource-viewer__placeholder" role="status">
          <div className="resource-viewer__spinner" aria-hidden="true" />
          {t('viewer.loading')}
        </div>
      )}

      <figcaption className="resource-viewer__caption">
        {status === 'error' && error ? (
          <span className="resource-viewer__badge" role="alert">
            {t(`viewer.errors.${error.kind}`)}
          </span>
        ) : null}
        {lastUpdatedAt !== null ? (
          <span className="resource-viewer__updated">
            {t('viewer.updatedAt', { time: new Date(lastUpdatedAt).toLocaleTimeString() })}
          </span>
        ) : null}
        <button type="button" className="resource-viewer__refresh" onClick={refresh}>
          {t('viewer.refresh')}
        </button>
      </figcaption>
    </figure>
  );
}
