import { describe, it, expect, vi } from 'vitest';
import { fireEvent, render, screen } from '@testing-library/react';
import type { CapsuleEdge } from 'shared';
import { useSwipeDismiss } from '../../src/hooks/useSwipeDismiss';

// ─── Harness ──────────────────────────────────────────────────────────────────

interface HarnessProps {
  edge: CapsuleEdge;
  onDismiss: () => void;
  onOffsetChange: (offset: number) => void;
  onClick?: () => void;
  now: () => number;
}

function SwipeTarget({ edge, onDismiss, onOffsetChange, onClick, now }: HarnessProps) {
  const { handlers, isDragging } = useSwipeDismiss({ edge, onDismiss, onOffsetChange, now });
  return (
    <div data-testid="target" data-dragging={isDragging ? 'yes' : 'no'} onClick={onClick} {...handlers} />
  );
}

function setup(edge: CapsuleEdge) {
  let t = 0;
  const clock = {
    set: (ms: number) => {
      t = ms;
    },
  };
  const onDismiss = vi.fn();
  const onOffsetChange = vi.fn();
  const onClick = vi.fn();
  render(
    <SwipeTarget edge={edge} onDismiss={onDismiss} onOffsetChange={onOffsetChange} onClick={onClick} now={() => t} />,
  );
  return { target: screen.getByTestId('target'), clock, onDismiss, onOffsetChange, onClick };
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('useSwipeDismiss', () => {
  it('springs back after a short slow drag toward the edge', () => {
    const { target, clock, onDismiss, onOffsetChange } = setup('bottom');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    clock.set(100);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 120 });
    clock.set(200);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 130 });
    fireEvent.pointerUp(target, { pointerId: 1, clientY: 130 });

    expect(onOffsetChange.mock.calls).toEqual([[20], [30], [0]]);
    expect(onDismiss).not.toHaveBeenCalled();
  });

  it('dismisses a drag past the distance threshold', () => {
    const { target, clock, onDismiss } = setup('bottom');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    clock.set(500);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 170 });
    fireEvent.pointerUp(target, { pointerId: 1, clientY: 170 });

    expect(onDismiss).toHaveBeenCalledTimes(1);
  });

  it('dismisses a short fast flick toward the edge', () => {
    const { target, clock, onDismiss } = setup('bottom');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    clock.set(10);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 110 });
    clock.set(20);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 125 });
    fireEvent.pointerUp(target, { pointerId: 1, clientY: 125 });

    expect(onDismiss).toHaveBeenCalledTimes(1);
  });

  it('keeps a fast drag that rests before release', () => {
    const { target, clock, onDismiss, onOffsetChange } = setup('bottom');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    clock.set(10);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 110 });
    clock.set(20);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 130 });
    clock.set(2000);
    fireEvent.pointerUp(target, { pointerId: 1, clientY: 130 });

    expect(onDismiss).not.toHaveBeenCalled();
    expect(onOffsetChange).toHaveBeenLastCalledWith(0);
  });

  it('measures velocity up to the release point', () => {
    const { target, clock, onDismiss } = setup('bottom');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    clock.set(200);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 110 });
    clock.set(220);
    fireEvent.pointerUp(target, { pointerId: 1, clientY: 130 });

    expect(onDismiss).toHaveBeenCalledTimes(1);
  });

  it('dismisses upward for a top capsule', () => {
    const { target, clock, onDismiss, onOffsetChange } = setup('top');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    clock.set(400);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 40 });
    fireEvent.pointerUp(target, { pointerId: 1, clientY: 40 });

    expect(onOffsetChange).toHaveBeenCalledWith(-60);
    expect(onDismiss).toHaveBeenCalledTimes(1);
  });

  it('damps a drag away from the edge', () => {
    const { target, clock, onDismiss, onOffsetChange } = setup('bottom');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    clock.set(300);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 60 });
    fireEvent.pointerUp(target, { pointerId: 1, clientY: 60 });

    expect(onOffsetChange.mock.calls).toEqual([[-8], [0]]);
    expect(onDismiss).not.toHaveBeenCalled();
  });

  it('springs back when the pointer is cancelled', () => {
    const { target, clock, onDismiss, onOffsetChange } = setup('bottom');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    clock.set(300);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 200 });
    fireEvent.pointerCancel(target, { pointerId: 1, clientY: 200 });

    expect(onDismiss).not.toHaveBeenCalled();
    expect(onOffsetChange).toHaveBeenLastCalledWith(0);
  });

  it('treats movement inside the tap slop as a tap', () => {
    const { target, onOffsetChange, onClick } = setup('bottom');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 103 });
    fireEvent.pointerUp(target, { pointerId: 1, clientY: 103 });
    fireEvent.click(target);

    expect(onOffsetChange).not.toHaveBeenCalled();
    expect(onClick).toHaveBeenCalledTimes(1);
  });

  it('swallows the click that ends a drag', () => {
    const { target, clock, onClick } = setup('bottom');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    clock.set(300);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 120 });
    fireEvent.pointerUp(target, { pointerId: 1, clientY: 120 });
    fireEvent.click(target);

    expect(onClick).not.toHaveBeenCalled();

    // Only the one click is swallowed
    fireEvent.click(target);
    expect(onClick).toHaveBeenCalledTimes(1);
  });

  it('reports dragging only while a drag is in progress', () => {
    const { target, clock } = setup('bottom');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    expect(target.getAttribute('data-dragging')).toBe('no');

    clock.set(100);
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 130 });
    expect(target.getAttribute('data-dragging')).toBe('yes');

    fireEvent.pointerUp(target, { pointerId: 1, clientY: 130 });
    expect(target.getAttribute('data-dragging')).toBe('no');
  });
});

describe('useSwipeDismiss — options', () => {
  function OptionsTarget({ onDismiss, distanceThreshold }: { onDismiss: () => void; distanceThreshold: number }) {
    const { handlers } = useSwipeDismiss({
      edge: 'bottom',
      onDismiss,
      onOffsetChange: () => {},
      options: { distanceThreshold },
      now: () => 0,
    });
    return <div data-testid="options-target" {...handlers} />;
  }

  it('honours a custom distance threshold', () => {
    const onDismiss = vi.fn();
    render(<OptionsTarget onDismiss={onDismiss} distanceThreshold={20} />);
    const target = screen.getByTestId('options-target');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 125 });
    fireEvent.pointerUp(target, { pointerId: 1, clientY: 125 });

    expect(onDismiss).toHaveBeenCalledTimes(1);
  });

  it('falls back to the default threshold for an invalid one', () => {
    const onDismiss = vi.fn();
    render(<OptionsTarget onDismiss={onDismiss} distanceThreshold={-5} />);
    const target = screen.getByTestId('options-target');

    fireEvent.pointerDown(target, { pointerId: 1, clientY: 100 });
    fireEvent.pointerMove(target, { pointerId: 1, clientY: 125 });
    fireEvent.pointerUp(target, { pointerId: 1, clientY: 125 });

    expect(onDismiss).not.toHaveBeenCalled();
  });
});
