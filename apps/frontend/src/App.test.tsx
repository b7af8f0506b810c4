import { render, screen } from '@testing-library/react';
import { describe, expect, it, vi } from 'vitest';

import type { ResourceFetchResult } from '@/shared/api/resource';

import App from './App';

const hoisted = vi.hoisted(() => ({
  fetchResource: vi.fn<() => Promise<ResourceFetchResult>>(),
}));

vi.mock('@/shared/api/resource', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@/shared/api/resource')>();
  return { ...actual, fetchResource: hoisted.fetchResource };
});

describe('App', () => {
  it('renders the title and starts polling for the chart', () => {
    hoisted.fetchResource.mockReturnValue(new Promise<ResourceFetchResult>(() => {}));
    render(<App pollIntervalMs={5_000} />);

    expect(screen.getByRole('heading', { level: 1 })).toHaveTextContent('Chart');
    expect(screen.getByRole('status')).toHaveTextContent('Waiting for the chart…');
    expect(hoisted.fetchResource).toHaveBeenCalledTimes(1);
  });
});
