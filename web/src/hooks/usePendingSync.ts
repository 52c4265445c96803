import { useCallback, useEffect, useState } from 'react';
import type { DataAccessContext } from '../context';
import type { DrainResult } from '../client/OfflineQueue';

export interface PendingSyncState {
  /** Mutations waiting in the offline queue */
  pending: number;
  online: boolean;
}

/**
 * Backs "N changes pending sync" indicators.
 */
export function usePendingSync(context: Pick<DataAccessContext, 'queue' | 'connectivity' | 'transport'>) {
  const { queue, connectivity, transport } = context;
  const [state, setState] = useState<PendingSyncState>(() => ({
    pending: queue.size(),
    online: connectivity.isOnline(),
  }));

  useEffect(() => {
    setState({ pending: queue.size(), online: connectivity.isOnline() });
    const offQueue = queue.subscribe((operations) => setState((prev) => ({ ...prev, pending: operations.length })));
    const offNetwork = connectivity.onChange((online) => setState((prev) => ({ ...prev, online })));
    return () => {
      offQueue();
      offNetwork();
    };
  }, [queue, connectivity]);

  const syncNow = useCallback((): Promise<DrainResult> => transport.drainOfflineQueue(), [transport]);

  return { ...state, syncNow };
}
