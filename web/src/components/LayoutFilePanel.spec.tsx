// @vitest-environment jsdom
import { cleanup, render, screen, waitFor } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationError } from '../../../src/errors';
import { SeatingLayout } from '../../../src/seating/layout';
import { downloadLayout, readLayoutFile } from '../api/client';
import { LayoutFilePanel } from './LayoutFilePanel';

vi.mock('../api/client', () => {
  return {
    DEFAULT_LAYOUT_FILENAME: 'seating.json',
    readLayoutFile: vi.fn(),
    loadBackgroundImage: vi.fn(),
    downloadLayout: vi.fn(),
  };
});

const layout = new SeatingLayout([{ seatId: 'sofa', xMin: 0.1, yMin: 0.2, xMax: 0.6, yMax: 0.9 }]);

describe('LayoutFilePanel', () => {
  afterEach(() => {
    cleanup();
  });

  it('loads a layout file and remembers its name for saving', async () => {
    const user = userEvent.setup();
    vi.mocked(readLayoutFile).mockResolvedValue(layout);
    const onLayoutLoaded = vi.fn();
    const onStatus = vi.fn();

    const { rerender } = render(
      <LayoutFilePanel layout={null} onLayoutLoaded={onLayoutLoaded} onBackgroundLoaded={() => {}} onStatus={onStatus} />
    );
    expect(screen.getByRole('button', { name: 'Save' }).hasAttribute('disabled')).toBe(true);

    await user.upload(screen.getByLabelText('Layout file'), new File(['{}'], 'lounge.json', { type: 'application/json' }));

    await waitFor(() => expect(onLayoutLoaded).toHaveBeenCalledWith(layout));
    expect(onStatus).toHaveBeenLastCalledWith('loaded', 'Loaded 1 seat(s) from lounge.json');

    rerender(
      <LayoutFilePanel layout={layout} onLayoutLoaded={onLayoutLoaded} onBackgroundLoaded={() => {}} onStatus={onStatus} />
    );
    await user.click(screen.getByRole('button', { name: 'Save' }));

    expect(downloadLayout).toHaveBeenCalledWith(layout, 'lounge.json');
    expect(onStatus).toHaveBeenLastCalledWith('saved', 'Saved 1 seat(s) to lounge.json');
  });

  it('reports a malformed layout file', async () => {
    const user = userEvent.setup();
    vi.mocked(readLayoutFile).mockRejectedValue(new ConfigurationError('Seating configuration is not valid JSON'));
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const onLayoutLoaded = vi.fn();
    const onStatus = vi.fn();

    render(
      <LayoutFilePanel layout={null} onLayoutLoaded={onLayoutLoaded} onBackgroundLoaded={() => {}} onStatus={onStatus} />
    );
    await user.upload(screen.getByLabelText('Layout file'), new File(['nope'], 'broken.json', { type: 'application/json' }));

    await waitFor(() =>
      expect(onStatus).toHaveBeenLastCalledWith('error', 'ConfigurationError: Seating configuration is not valid JSON')
    );
    expect(onLayoutLoaded).not.toHaveBeenCalled();
  });
});
