import { useState } from 'react';
import type { PresentationMode } from 'shared';
import { CapsuleOverlay } from './components/capsule/CapsuleOverlay';
import { parseDemoEnv } from './config/env';
import { useCapsuleStore } from './stores/capsuleStore';
import styles from './App.module.css';

const env = parseDemoEnv(import.meta.env);

/**
 * Demo page: buttons that present capsules in each configuration, plus a
 * log of the actions the capsules report back.
 */
export function App() {
  const present = useCapsuleStore((s) => s.present);
  const [events, setEvents] = useState<string[]>([]);

  const record = (event: string) => setEvents((prev) => [event, ...prev].slice(0, 8));

  const mode: PresentationMode = { edge: env.VITE_CAPSULE_EDGE, yOffset: env.VITE_CAPSULE_Y_OFFSET };
  const flipped: PresentationMode = {
    edge: mode.edge === 'top' ? 'bottom' : 'top',
    yOffset: env.VITE_CAPSULE_Y_OFFSET,
  };

  return (
    <div className={styles.page}>
      <h1 className={styles.heading}>Capsule overlay</h1>
      <div className={styles.buttons}>
        <button
          type="button"
          onClick={() =>
            present({
              title: 'Saved to library',
              timeoutInterval: env.VITE_CAPSULE_TIMEOUT_SECONDS,
              presentationMode: mode,
              onDismissButtonPressed: () => record('dismissed'),
            })
          }
        >
          Title only
        </button>
        <button
          type="button"
          onClick={() =>
            present({
              title: 'Item deleted',
              accentColor: '#FF3B30',
              timeoutInterval: env.VITE_CAPSULE_TIMEOUT_SECONDS,
              presentationMode: mode,
              primaryAction: {
                kind: 'enabled',
                iconIdentifier: 'arrow.uturn.backward',
                onPressed: () => record('undo'),
              },
            })
          }
        >
          With undo
        </button>
        <button
          type="button"
          onClick={() =>
            present({
              title: 'Added to favourites',
              accentColor: '#FF9500',
              timeoutInterval: env.VITE_CAPSULE_TIMEOUT_SECONDS,
              presentationMode: flipped,
              primaryAction: {
                kind: 'enabled',
                iconIdentifier: 'chevron.right',
                onPressed: () => record('open favourites'),
              },
              secondaryAction: {
                kind: 'enabled',
                iconIdentifier: 'star.fill',
                onPressed: () => record('unfavourite'),
              },
            })
          }
        >
          Both actions ({flipped.edge})
        </button>
      </div>
      <ul className={styles.events} aria-label="Capsule events">
        {events.map((event, i) => (
          <li key={`${i}-${event}`}>{event}</li>
        ))}
      </ul>
      <CapsuleOverlay />
    </div>
  );
}
