/**
 * Test Utilities Module
 *
 * Shared fakes and reset helpers for tests.
 *
 * @example
 * ```typescript
 * import { createVocabularyEmbedder, ScriptedGenerator } from '../../test-utils/index.js';
 *
 * const embedder = createVocabularyEmbedder(['kettle', 'blender', 'quiet']);
 * const generator = new ScriptedGenerator().reply('Try the kettle.');
 * ```
 */

export { resetAll } from './reset.js';
export {
  createVocabularyEmbedder,
  ScriptedGenerator,
  generatorDown,
  deferred,
  createTestDatabase,
  type VocabularyEmbedder,
  type GeneratorCall,
  type Deferred,
} from './fakes.js';
