import type { IngestionConfig } from '../config';
import { LEGISTAR_SOURCE_NAME, LegistarSource } from './legistar';
import { SFBOS_SOURCE_NAME, SfbosSource } from './sfbos';
import type { SourceAdapter } from './types';

export const SOURCE_NAMES = [SFBOS_SOURCE_NAME, LEGISTAR_SOURCE_NAME] as const;

export type SourceName = (typeof SOURCE_NAMES)[number];

export function createSource(name: SourceName, config: IngestionConfig): SourceAdapter {
  switch (name) {
    case 'sfbos':
      return new SfbosSource(config.sfbosMeetingsUrl, config.http);
    case 'legistar':
      return new LegistarSource(config.legistar, config.http);
  }
}
