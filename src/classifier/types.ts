import type { ClassificationDegraded } from '../errors.js';
import type { Category, Taxonomy } from '../taxonomy/taxonomy.js';

export interface Classification {
  category: Category;
  /** Set when the catch-all was used because the real answer was unavailable or unusable. */
  degraded?: ClassificationDegraded;
}

export interface Classifier {
  /** Throws ClassifierAuthError / ClassifierRequestError; every other failure degrades. */
  classify(text: string, taxonomy: Taxonomy, signal?: AbortSignal): Promise<Classification>;
  ping(): Promise<void>;
}
