/**
 * Structured response parser.
 *
 * @packageDocumentation
 */

export {
  type ParseRecordOptions,
  type ParsedRecord,
  type RecordSource,
  isPlainObject,
  parseRecord,
  stripFenceLines,
} from './record.js';
export { type NamedBlocks, extractNamedBlocks } from './named-blocks.js';
