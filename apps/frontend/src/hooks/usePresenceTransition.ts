import { useEffect, useRef, useState } from 'react';

/**
 * - 'entering': mounted in the off-screen pose, about to animate in
 * - 'entered': on screen
 * - 'exiting': still mounted while it animates out
 * - 'exited': nothing rendered
 */
export type TransitionPhase = 'entering' | 'entered' | 'exiting' | 'exited';

function nextFrame(cb: () => void): () => void {
  if (typeof requestAnimationFrame === 'function') {
    const frame = requestAnimationFrame(cb);
    return () => cancelAnimationFrame(frame);
  }
  const handle = setTimeout(cb, 16);
  return () => clearTimeout(handle);
}

/**
 * Keeps the last non-null item rendered for `exitMs` after it goes away so
 * the exit animation can run. A replacement item takes over immediately.
 *
 * `generation` changes with every new item, including an equal-looking one,
 * and is meant as a React key for whatever renders `rendered`.
 */
export function usePresenceTransition<T>(item: T | null, exitMs: number) {
  const [rendered, setRendered] = useState<T | null>(item);
  const [phase, setPhase] = useState<TransitionPhase>(item ? 'entered' : 'exited');
  const [generation, setGeneration] = useState(0);
  const lastItemRef = useRef(item);

  useEffect(() => {
    const isNewItem = item !== lastItemRef.current;
    lastItemRef.current = item;

    if (item) {
      setRendered(item);
      if (isNewItem) setGeneration((g) => g + 1);
      setPhase('entering');
      return nextFrame(() => setPhase('entered'));
    }

    setPhase((prev) => (prev === 'exited' ? prev : 'exiting'));
    const handle = setTimeout(() => {
      setRendered(null);
      setPhase('exited');
    }, exitMs);
    return () => clearTimeout(handle);
  }, [item, exitMs]);

  return { rendered, phase, generation };
}
