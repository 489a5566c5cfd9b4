/**
 * Block Registry
 *
 * Maps kind tags to block factories. Deserialization goes through here so
 * records of unknown kinds are skipped with a warning instead of failing a
 * whole document.
 */

import type {
  BlockCategory,
  BlockDescriptor,
  BlockKind,
  ParameterValue,
  SerializedBlock,
} from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { log } from '../../utils/logger.js';
import {
  AssertBlock,
  CommentBlock,
  DelayBlock,
  InstrumentCommandBlock,
  LogDataBlock,
  MeasureBlock,
  OutputEnableBlock,
  SetCurrentBlock,
  SetVoltageBlock,
} from './action-blocks.js';
import type { BaseBlock } from './base-block.js';
import {
  ElseBlock,
  EndBlock,
  IfBlock,
  LoopBlock,
  ParallelBlock,
  SweepBlock,
  TryBlock,
  WaitForBlock,
  WhileBlock,
} from './control-blocks.js';
import { DataTransformBlock, MathBlock, SetVariableBlock } from './data-blocks.js';

const logger = log.child({ service: 'block-registry' });

export type BlockFactory = (id?: string) => BaseBlock;

/**
 * A block record as it appears in a loaded document. Older documents name the
 * block class under `type` and the id under `block_id`.
 */
export interface BlockRecord {
  kind?: string;
  type?: string;
  id?: string;
  block_id?: string;
  parameters?: Record<string, ParameterValue>;
}

export interface DeserializeOptions {
  /** Called for each parameter name the block does not declare */
  onUnknownParameter?: (name: string, block: BaseBlock) => void;
}

const LEGACY_CLASS_NAMES = new Map<string, BlockKind>([
  ['DelayBlock', 'delay'],
  ['SetVoltageBlock', 'set_voltage'],
  ['SetCurrentBlock', 'set_current'],
  ['OutputEnableBlock', 'output_enable'],
  ['MeasureBlock', 'measure'],
  ['LoopBlock', 'loop'],
  ['IfBlock', 'if'],
  ['LogDataBlock', 'log_data'],
  ['CommentBlock', 'comment'],
  ['AssertBlock', 'assert'],
  ['SetVariableBlock', 'set_variable'],
  ['WhileBlock', 'while'],
  ['TryExceptBlock', 'try'],
  ['ParallelBlock', 'parallel'],
  ['WaitForBlock', 'wait_for'],
  ['MathBlock', 'math'],
  ['DataTransformBlock', 'data_transform'],
  ['SweepBlock', 'sweep'],
]);

export class BlockRegistry {
  private factories = new Map<BlockKind, BlockFactory>();

  /**
   * Overwrites any factory already registered for `kind`
   */
  register(kind: BlockKind, factory: BlockFactory): void {
    this.factories.set(kind, factory);
  }

  has(kind: string): boolean {
    return this.resolveKind(kind) !== undefined;
  }

  listKinds(): BlockKind[] {
    return Array.from(this.factories.keys());
  }

  /**
   * Accepts a kind tag or a legacy class name
   */
  resolveKind(name: string): BlockKind | undefined {
    const kind = this.listKinds().find((registered) => registered === name) ?? LEGACY_CLASS_NAMES.get(name);
    return kind && this.factories.has(kind) ? kind : undefined;
  }

  /**
   * @throws ValidationError for an unregistered kind
   */
  create(kind: string, id?: string): BaseBlock {
    const resolved = this.resolveKind(kind);
    const factory = resolved ? this.factories.get(resolved) : undefined;
    if (!factory) {
      throw new ValidationError(`Unknown block kind: ${kind}`, {
        operation: 'createBlock',
        input: kind,
        suggestion: `Known kinds: ${this.listKinds().join(', ')}`,
      });
    }
    return factory(id);
  }

  /**
   * Rebuild a block from its record. Returns null for an unknown kind.
   * Parameter type errors propagate.
   */
  deserialize(record: BlockRecord | SerializedBlock, options: DeserializeOptions = {}): BaseBlock | null {
    const legacy: BlockRecord = record;
    const kindName = legacy.kind ?? legacy.type ?? '';
    const kind = this.resolveKind(kindName);
    if (!kind) {
      logger.warn(`Unknown block type: ${kindName || '(missing)'}, skipping`, {
        operation: 'deserialize',
        blockId: legacy.id ?? legacy.block_id,
      });
      return null;
    }

    const block = this.create(kind, legacy.id || legacy.block_id || undefined);
    for (const [name, value] of Object.entries(legacy.parameters ?? {})) {
      if (!block.hasParameter(name)) {
        logger.warn(`Unknown parameter '${name}' on ${block.name}, skipping`, {
          operation: 'deserialize',
          blockId: block.id,
        });
        options.onUnknownParameter?.(name, block);
        continue;
      }
      block.setParameter(name, value);
    }
    return block;
  }

  /**
   * Palette description of every registered kind
   */
  getCatalog(): BlockDescriptor[] {
    return Array.from(this.factories.values(), (factory) => factory().describe());
  }

  /**
   * Display names grouped by category
   */
  getCategories(): Partial<Record<BlockCategory, string[]>> {
    const categories: Partial<Record<BlockCategory, string[]>> = {};
    for (const { category, name } of this.getCatalog()) {
      const names = categories[category] ?? [];
      names.push(name);
      categories[category] = names;
    }
    return categories;
  }

  /**
   * Clear all registrations (tests only)
   */
  clear(): void {
    this.factories.clear();
  }
}

export function registerDefaultBlocks(registry: BlockRegistry): void {
  // Actions
  registry.register('delay', (id) => new DelayBlock(id));
  registry.register('set_voltage', (id) => new SetVoltageBlock(id));
  registry.register('set_current', (id) => new SetCurrentBlock(id));
  registry.register('output_enable', (id) => new OutputEnableBlock(id));
  registry.register('measure', (id) => new MeasureBlock(id));
  registry.register('log_data', (id) => new LogDataBlock(id));
  registry.register('comment', (id) => new CommentBlock(id));
  registry.register('assert', (id) => new AssertBlock(id));
  registry.register('instrument_command', (id) => new InstrumentCommandBlock(id));

  // Control flow
  registry.register('loop', (id) => new LoopBlock(id));
  registry.register('while', (id) => new WhileBlock(id));
  registry.register('if', (id) => new IfBlock(id));
  registry.register('else', (id) => new ElseBlock(id));
  registry.register('try', (id) => new TryBlock(id));
  registry.register('parallel', (id) => new ParallelBlock(id));
  registry.register('end', (id) => new EndBlock(id));
  registry.register('wait_for', (id) => new WaitForBlock(id));
  registry.register('sweep', (id) => new SweepBlock(id));

  // Data
  registry.register('set_variable', (id) => new SetVariableBlock(id));
  registry.register('math', (id) => new MathBlock(id));
  registry.register('data_transform', (id) => new DataTransformBlock(id));
}

let globalRegistry: BlockRegistry | null = null;

export function getBlockRegistry(): BlockRegistry {
  if (!globalRegistry) {
    globalRegistry = new BlockRegistry();
    registerDefaultBlocks(globalRegistry);
  }
  return globalRegistry;
}

/**
 * Drop the global registry so the next access rebuilds the defaults (tests only)
 */
export function resetBlockRegistry(): void {
  globalRegistry = null;
}

export function createBlock(kind: string, id?: string): BaseBlock {
  return getBlockRegistry().create(kind, id);
}

export function deserializeBlock(
  record: BlockRecord | SerializedBlock,
  options?: DeserializeOptions
): BaseBlock | null {
  return getBlockRegistry().deserialize(record, options);
}

export function getBlockCatalog(): BlockDescriptor[] {
  return getBlockRegistry().getCatalog();
}

export function getBlockCategories(): Partial<Record<BlockCategory, string[]>> {
  return getBlockRegistry().getCategories();
}
