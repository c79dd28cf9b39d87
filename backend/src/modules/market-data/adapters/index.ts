import type { SourceName } from '../contracts/market-data.contracts.js';
import { blsAdapter } from './bls.adapter.js';
import { fredAdapter } from './fred.adapter.js';
import { metalsAdapter } from './metals.adapter.js';
import type { SourceAdapter } from './source.adapter.js';

export const ADAPTERS: Record<SourceName, SourceAdapter> = {
  bls: blsAdapter,
  metals: metalsAdapter,
  fred: fredAdapter,
};

export function getAdapter(source: SourceName): SourceAdapter {
  return ADAPTERS[source];
}

export { blsAdapter, fredAdapter, metalsAdapter };
export { ObservationDeduper, parsePayload } from './source.adapter.js';
export type { AdapterDiagnostics, DroppedEntry, SourceAdapter } from './source.adapter.js';
