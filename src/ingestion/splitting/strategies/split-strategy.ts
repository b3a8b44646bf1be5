import type { LoadedDocument } from '../../types/document.types';
import type { SplitSection } from '../../types/chunk.types';

export interface SplitStrategy {
  split(document: LoadedDocument): Promise<SplitSection[]>;
}
