import { useEffect, useState, type FormEvent } from 'react';
import clsx from 'clsx';
import type { EditorAction, SeatDraft } from '../../../src/editor/types';
import type { LivePose, StreamStatus } from '../types';

interface Props {
  seats: SeatDraft[];
  selectedSeatId: string | null;
  editing: boolean;
  status: string;
  live: LivePose | null;
  connection: StreamStatus;
  onAction: (action: EditorAction) => void;
  onRename: (seatId: string) => boolean;
}

/** Render a single toggle button row. */
const ToggleRow = ({ label, value, onClick }: { label: string; value: boolean; onClick: () => void }) => (
  <button className={clsx('button-ghost toggle-row', value && 'is-on')} onClick={onClick}>
    <span>{label}</span>
    <span className="accent">{value ? 'ON' : 'OFF'}</span>
  </button>
);

const ACTIONS: { action: EditorAction; label: string; key: string }[] = [
  { action: 'create', label: 'Add seat', key: 'N' },
  { action: 'next', label: 'Next seat', key: 'Tab' },
  { action: 'delete', label: 'Delete seat', key: 'Del' },
  { action: 'clear', label: 'Clear all', key: 'C' },
];

const pct = (value: number) => `${(value * 100).toFixed(1)}%`;

/**
 * Right-side control panel.
 *
 * Lists the seats, mirrors the editor's keyboard actions as buttons and shows which
 * seat the live stream currently reports as occupied.
 */
export function Sidebar({ seats, selectedSeatId, editing, status, live, connection, onAction, onRename }: Props) {
  const [draftId, setDraftId] = useState(selectedSeatId ?? '');

  useEffect(() => {
    setDraftId(selectedSeatId ?? '');
  }, [selectedSeatId]);

  const activeSeatId = live?.seating?.activeSeatId ?? null;

  const handleRename = (e: FormEvent) => {
    e.preventDefault();
    onRename(draftId);
  };

  return (
    <div className="card sidebar">
      <div>
        <p className="label">Live stream</p>
        <p className="headline accent">{connection}</p>
        {live && (
          <p className="muted">
            Active seat: {activeSeatId ?? 'none'}
            {live.seating && activeSeatId && ` (${live.seating.confidence.toFixed(2)})`}
          </p>
        )}
      </div>
      <div className="stack">
        <p className="label">Editor</p>
        <ToggleRow label="Edit mode" value={editing} onClick={() => onAction('toggle')} />
        {ACTIONS.map(({ action, label, key }) => (
          <button key={action} className="button-ghost" disabled={!editing} onClick={() => onAction(action)}>
            {label} <kbd>{key}</kbd>
          </button>
        ))}
        <p className="muted" role="status">
          {status}
        </p>
      </div>
      <form className="row" onSubmit={handleRename}>
        <label className="row">
          <span className="muted">Seat id</span>
          <input
            className="input"
            value={draftId}
            disabled={!editing || selectedSeatId === null}
            onChange={(e) => setDraftId(e.target.value)}
          />
        </label>
        <button type="submit" className="button-primary" disabled={!editing || selectedSeatId === null}>
          Rename
        </button>
      </form>
      <ul className="seat-list">
        {seats.length === 0 && <li className="muted">No seats</li>}
        {seats.map((seat) => (
          <li
            key={seat.seatId}
            className={clsx(
              'card seat-item',
              seat.seatId === selectedSeatId && 'is-selected',
              seat.seatId === activeSeatId && 'is-active'
            )}
          >
            <span className="seat-id">{seat.seatId}</span>
            <span className="muted">
              {pct(seat.xMin)}, {pct(seat.yMin)} → {pct(seat.xMax)}, {pct(seat.yMax)}
            </span>
          </li>
        ))}
      </ul>
    </div>
  );
}

export default Sidebar;
