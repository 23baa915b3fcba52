import { useState, type ChangeEvent } from 'react';
import type { SeatingLayout } from '../../../src/seating/layout';
import { describeError } from '../../../src/errors';
import { DEFAULT_LAYOUT_FILENAME, downloadLayout, loadBackgroundImage, readLayoutFile } from '../api/client';
import type { BackgroundImage, FileStatus } from '../types';

interface Props {
  /** Layout to save; saving is disabled while null. */
  layout: SeatingLayout | null;
  onLayoutLoaded: (layout: SeatingLayout) => void;
  onBackgroundLoaded: (background: BackgroundImage) => void;
  onStatus: (status: FileStatus, message: string) => void;
}

export function LayoutFilePanel({ layout, onLayoutLoaded, onBackgroundLoaded, onStatus }: Props) {
  const [filename, setFilename] = useState(DEFAULT_LAYOUT_FILENAME);

  const handleLayoutFile = async (e: ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (!file) return;
    onStatus('loading', `Reading ${file.name}`);
    try {
      const loaded = await readLayoutFile(file);
      setFilename(file.name);
      onLayoutLoaded(loaded);
      onStatus('loaded', `Loaded ${loaded.seats.length} seat(s) from ${file.name}`);
    } catch (err) {
      console.error(err);
      onStatus('error', describeError(err));
    }
  };

  const handleImageFile = async (e: ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (!file) return;
    try {
      onBackgroundLoaded(await loadBackgroundImage(file));
    } catch (err) {
      console.error(err);
      onStatus('error', `Could not open ${file.name}`);
    }
  };

  const handleSave = () => {
    if (!layout) return;
    downloadLayout(layout, filename);
    onStatus('saved', `Saved ${layout.seats.length} seat(s) to ${filename}`);
  };

  return (
    <div className="card stack">
      <div className="row spread">
        <div>
          <p className="label">Files</p>
          <p className="headline">Seating layout</p>
        </div>
        <button type="button" className="button-primary" disabled={!layout} onClick={handleSave}>
          Save
        </button>
      </div>
      <label className="row">
        <span className="field-label">Layout file</span>
        <input type="file" accept="application/json,.json" onChange={(e) => void handleLayoutFile(e)} />
      </label>
      <label className="row">
        <span className="field-label">Snapshot</span>
        <input type="file" accept="image/*" onChange={(e) => void handleImageFile(e)} />
      </label>
      <label className="row">
        <span className="field-label">Save as</span>
        <input
          className="input"
          value={filename}
          onChange={(e) => setFilename(e.target.value)}
          placeholder={DEFAULT_LAYOUT_FILENAME}
        />
      </label>
    </div>
  );
}

export default LayoutFilePanel;
