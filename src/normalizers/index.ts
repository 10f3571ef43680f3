import { Normalizer } from './normalizer.js';
import { GoodreadsNormalizer } from './goodreads.js';
import { LibraryThingNormalizer } from './librarything.js';
import { StoryGraphNormalizer } from './storygraph.js';
import { GenericNormalizer } from './generic.js';
import { ValidationError } from '../errors.js';

export { Normalizer, GoodreadsNormalizer, LibraryThingNormalizer, StoryGraphNormalizer, GenericNormalizer };

const NORMALIZERS: Record<string, () => Normalizer> = {
  goodreads: () => new GoodreadsNormalizer(),
  librarything: () => new LibraryThingNormalizer(),
  storygraph: () => new StoryGraphNormalizer(),
  generic: () => new GenericNormalizer(),
};

export const SOURCE_NAMES = Object.keys(NORMALIZERS);

export function getNormalizer(source: string): Normalizer {
  const key = source.toLowerCase();
  const create = Object.hasOwn(NORMALIZERS, key) ? NORMALIZERS[key] : undefined;
  if (!create) {
    throw new ValidationError(`Unknown import source "${source}" (expected one of: ${SOURCE_NAMES.join(', ')})`);
  }
  return create();
}
