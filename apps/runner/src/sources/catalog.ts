import { ashbyAdapter } from '@boardwatch/adapter-ashby';
import { greenhouseAdapter } from '@boardwatch/adapter-greenhouse';
import { leverAdapter } from '@boardwatch/adapter-lever';
import { workdayAdapter } from '@boardwatch/adapter-workday';
import type { AdapterDefinition } from '@boardwatch/source-sdk';

const allAdapters: AdapterDefinition[] = [greenhouseAdapter, leverAdapter, ashbyAdapter, workdayAdapter];

export function buildAdapterMap(adapters: readonly AdapterDefinition[]): Map<string, AdapterDefinition> {
  const adapterMap = new Map<string, AdapterDefinition>();

  for (const adapter of adapters) {
    if (adapterMap.has(adapter.manifest.id)) {
      throw new Error(`Duplicate adapter id: ${adapter.manifest.id}`);
    }

    adapterMap.set(adapter.manifest.id, adapter);
  }

  return adapterMap;
}

const adapterMap = buildAdapterMap(allAdapters);

export function getAllAdapterDefinitions(): AdapterDefinition[] {
  return [...allAdapters];
}

export function getAdapterDefinition(source: string): AdapterDefinition {
  const adapter = adapterMap.get(source);
  if (!adapter) {
    throw new Error(`Unknown adapter id: ${source}`);
  }

  return adapter;
}
