/**
 * Sequence
 *
 * Ordered, named collection of blocks and its document form. Documents are
 * checked with a zod schema; JSON and YAML are interchangeable encodings.
 */

import * as yaml from 'js-yaml';
import { z } from 'zod';
import type { SequenceDocument, SequenceFormat } from '../../types/index.js';
import {
  SequenceFormatError,
  ValidationError,
  errorMessage,
  isAutomationError,
} from '../../utils/errors.js';
import { log } from '../../utils/logger.js';
import { deserializeBlock, type BaseBlock } from '../blocks/index.js';
import { buildBlockTree, type BlockTree } from './sequence-structure.js';

const logger = log.child({ service: 'sequence' });

export const DEFAULT_SEQUENCE_NAME = 'Untitled Sequence';

// ============================================================================
// Document Schema
// ============================================================================

const ParameterValueSchema = z.union([z.number(), z.string(), z.boolean(), z.null()]);

const BlockRecordSchema = z.object({
  kind: z.string().optional(),
  type: z.string().optional(),
  id: z.string().optional(),
  block_id: z.string().optional(),
  parameters: z.record(ParameterValueSchema).default({}),
});

const SequenceDocumentSchema = z.object({
  name: z.string().default(DEFAULT_SEQUENCE_NAME),
  description: z.string().default(''),
  metadata: z.record(z.unknown()).default({}),
  blocks: z.array(BlockRecordSchema).default([]),
});

export interface SequenceOptions {
  name?: string;
  description?: string;
  metadata?: Record<string, unknown>;
  blocks?: BaseBlock[];
}

// ============================================================================
// Sequence
// ============================================================================

export class Sequence implements Iterable<BaseBlock> {
  name: string;
  description: string;
  metadata: Record<string, unknown>;
  private readonly blockList: BaseBlock[] = [];

  constructor(options: SequenceOptions = {}) {
    this.name = options.name ?? DEFAULT_SEQUENCE_NAME;
    this.description = options.description ?? '';
    this.metadata = options.metadata ?? {};
    for (const block of options.blocks ?? []) {
      this.addBlock(block);
    }
  }

  get blocks(): readonly BaseBlock[] {
    return this.blockList;
  }

  get length(): number {
    return this.blockList.length;
  }

  [Symbol.iterator](): Iterator<BaseBlock> {
    return this.blockList[Symbol.iterator]();
  }

  // ==========================================================================
  // Editing
  // ==========================================================================

  /**
   * Append, or insert at `index` when given
   */
  addBlock(block: BaseBlock, index?: number): this {
    if (index === undefined) {
      this.blockList.push(block);
      return this;
    }
    return this.insertBlock(index, block);
  }

  insertBlock(index: number, block: BaseBlock): this {
    this.checkIndex(index, this.blockList.length, 'insertBlock');
    this.blockList.splice(index, 0, block);
    return this;
  }

  /**
   * Remove by position or by reference
   * @returns the removed block
   */
  removeBlock(target: number | BaseBlock): BaseBlock {
    const index = typeof target === 'number' ? target : this.blockList.indexOf(target);
    if (typeof target !== 'number' && index === -1) {
      throw new ValidationError(`Block ${target.id} is not part of sequence '${this.name}'`, {
        operation: 'removeBlock',
        blockId: target.id,
      });
    }
    this.checkIndex(index, this.blockList.length - 1, 'removeBlock');
    const [removed] = this.blockList.splice(index, 1);
    return removed;
  }

  moveBlock(fromIndex: number, toIndex: number): this {
    this.checkIndex(fromIndex, this.blockList.length - 1, 'moveBlock');
    this.checkIndex(toIndex, this.blockList.length - 1, 'moveBlock');
    const [block] = this.blockList.splice(fromIndex, 1);
    this.blockList.splice(toIndex, 0, block);
    return this;
  }

  getBlock(id: string): BaseBlock | undefined {
    return this.blockList.find((block) => block.id === id);
  }

  indexOf(block: BaseBlock): number {
    return this.blockList.indexOf(block);
  }

  private checkIndex(index: number, max: number, operation: string): void {
    if (!Number.isInteger(index) || index < 0 || index > max) {
      throw new ValidationError(`Block index ${index} out of range (0..${max})`, {
        operation,
        input: index,
      });
    }
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  /**
   * Empty-sequence, per-block and scope-structure problems
   */
  validate(): string[] {
    const errors: string[] = [];

    if (this.blockList.length === 0) {
      errors.push('Sequence has no blocks');
    }

    this.blockList.forEach((block, index) => {
      for (const error of block.validate()) {
        errors.push(`Block ${index} (${block.name}): ${error}`);
      }
    });

    errors.push(...buildBlockTree(this.blockList).errors);
    return errors;
  }

  buildTree(): BlockTree {
    return buildBlockTree(this.blockList);
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  toDocument(): SequenceDocument {
    return {
      name: this.name,
      description: this.description,
      metadata: { ...this.metadata },
      blocks: this.blockList.map((block) => block.serialize()),
    };
  }

  toJSON(): SequenceDocument {
    return this.toDocument();
  }

  toJSONString(): string {
    return JSON.stringify(this.toDocument(), null, 2);
  }

  toYAML(): string {
    return yaml.dump(this.toDocument(), { noRefs: true, sortKeys: false, lineWidth: -1 });
  }

  serialize(format: SequenceFormat): string {
    return format === 'json' ? this.toJSONString() : this.toYAML();
  }

  toString(): string {
    return `Sequence('${this.name}', ${this.blockList.length} blocks)`;
  }

  /**
   * Build a sequence from a decoded document. Unknown block kinds and
   * undeclared parameters are skipped with a warning.
   * @throws SequenceFormatError on a malformed document or a mistyped value
   */
  static fromDocument(data: unknown): Sequence {
    const parsed = SequenceDocumentSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      );
      throw new SequenceFormatError(`Invalid sequence document: ${issues.join('; ')}`, {
        operation: 'fromDocument',
        issues,
      });
    }

    const { name, description, metadata, blocks } = parsed.data;
    const sequence = new Sequence({ name, description, metadata });

    blocks.forEach((record, index) => {
      let block: BaseBlock | null;
      try {
        block = deserializeBlock(record);
      } catch (error) {
        if (!isAutomationError(error)) throw error;
        throw new SequenceFormatError(`Block ${index}: ${error.message}`, {
          operation: 'fromDocument',
          blockId: record.id ?? record.block_id,
        });
      }
      if (block) {
        sequence.addBlock(block);
      }
    });

    logger.debug('Sequence loaded', {
      sequence: name,
      blocks: sequence.length,
      skipped: blocks.length - sequence.length,
    });
    return sequence;
  }

  static fromJSON(text: string): Sequence {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      throw new SequenceFormatError(`Invalid JSON: ${errorMessage(error)}`, { operation: 'fromJSON' });
    }
    return Sequence.fromDocument(data);
  }

  static fromYAML(text: string): Sequence {
    let data: unknown;
    try {
      data = yaml.load(text);
    } catch (error) {
      throw new SequenceFormatError(`Invalid YAML: ${errorMessage(error)}`, { operation: 'fromYAML' });
    }
    return Sequence.fromDocument(data);
  }

  /**
   * Decode text of either encoding: JSON first, then YAML
   */
  static parse(text: string): Sequence {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      return Sequence.fromYAML(text);
    }
    return Sequence.fromDocument(data);
  }
}
