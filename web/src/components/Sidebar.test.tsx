// @vitest-environment jsdom
import { cleanup, render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { afterEach, describe, expect, it, vi } from 'vitest';
import Sidebar from './Sidebar';

const seats = [
  { seatId: 'left', xMin: 0, yMin: 0, xMax: 0.5, yMax: 1 },
  { seatId: 'right', xMin: 0.5, yMin: 0, xMax: 1, yMax: 1 },
];

describe('Sidebar', () => {
  afterEach(() => {
    cleanup();
  });

  it('calls onAction for editor buttons', async () => {
    const user = userEvent.setup();
    const onAction = vi.fn();

    render(
      <Sidebar
        seats={seats}
        selectedSeatId="left"
        editing
        status="Edit mode started"
        live={null}
        connection="disabled"
        onAction={onAction}
        onRename={() => true}
      />
    );

    await user.click(screen.getByRole('button', { name: /Edit mode/i }));
    expect(onAction).toHaveBeenCalledWith('toggle');

    await user.click(screen.getByRole('button', { name: /Add seat/i }));
    expect(onAction).toHaveBeenCalledWith('create');

    await user.click(screen.getByRole('button', { name: /Delete seat/i }));
    expect(onAction).toHaveBeenCalledWith('delete');

    await user.click(screen.getByRole('button', { name: /Clear all/i }));
    expect(onAction).toHaveBeenCalledWith('clear');
  });

  it('disables seat actions outside edit mode', async () => {
    const user = userEvent.setup();
    const onAction = vi.fn();

    render(
      <Sidebar
        seats={seats}
        selectedSeatId="left"
        editing={false}
        status="Press 'E' to edit seats"
        live={null}
        connection="disabled"
        onAction={onAction}
        onRename={() => true}
      />
    );

    await user.click(screen.getByRole('button', { name: /Next seat/i }));
    expect(onAction).not.toHaveBeenCalled();
    expect(screen.getByRole('status').textContent).toBe("Press 'E' to edit seats");
  });

  it('submits a new id for the selected seat', async () => {
    const user = userEvent.setup();
    const onRename = vi.fn(() => true);

    render(
      <Sidebar
        seats={seats}
        selectedSeatId="left"
        editing
        status=""
        live={null}
        connection="disabled"
        onAction={() => {}}
        onRename={onRename}
      />
    );

    const input = screen.getByLabelText('Seat id');
    await user.clear(input);
    await user.type(input, 'window');
    await user.click(screen.getByRole('button', { name: 'Rename' }));

    expect(onRename).toHaveBeenCalledWith('window');
  });

  it('highlights the seat the live stream reports', () => {
    render(
      <Sidebar
        seats={seats}
        selectedSeatId="left"
        editing={false}
        status=""
        live={{
          timestamp: 5,
          root: { x: 0.7, y: 0.5 },
          seating: { activeSeatId: 'right', confidence: 0.4, seats: [] },
        }}
        connection="open"
        onAction={() => {}}
        onRename={() => true}
      />
    );

    expect(screen.getByText('Active seat: right (0.40)')).toBeTruthy();
    expect(screen.getByText('right').closest('li')?.className).toBe('card seat-item is-active');
  });
});
