import type { TabularInput } from '@shared/types';

/**
 * Input Reader Interface
 * Layer: Domain
 *
 * One implementation per file format. Readers only turn bytes into header-keyed
 * rows; recognising the geohash columns is the adapter's job.
 */
export interface IInputReader {
  read(filePath: string): Promise<TabularInput>;
}
