/**
 * Base Block
 *
 * Abstract base class for every sequence block. A block declares its
 * parameters once, validates them against their bounds, and executes against
 * an ExecutionContext. Control-flow blocks additionally declare how they take
 * part in the scope structure; the executor interprets that structure.
 */

import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type {
  BlockCategory,
  BlockDescriptor,
  BlockKind,
  BlockOutcome,
  BlockParameter,
  BlockStructure,
  ParameterType,
  ParameterValue,
  SerializedBlock,
} from '../../types/index.js';
import {
  BlockExecutionError,
  UnknownParameterError,
  ValidationError,
} from '../../utils/errors.js';
import { validateExpression } from '../expression/index.js';
import type { ExecutionContext } from '../execution/execution-context.js';

export interface ParameterOptions {
  description?: string;
  min?: number;
  max?: number;
  choices?: readonly ParameterValue[];
}

const PARAMETER_SCHEMAS: Record<ParameterType, z.ZodTypeAny> = {
  int: z.number().int(),
  float: z.number(),
  string: z.string(),
  bool: z.boolean(),
  choice: z.union([z.string(), z.number(), z.boolean()]),
  instrument: z.string().nullable(),
};

const TYPE_DESCRIPTIONS: Record<ParameterType, string> = {
  int: 'an integer',
  float: 'a number',
  string: 'a string',
  bool: 'a boolean',
  choice: 'one of the listed choices',
  instrument: 'an instrument name',
};

function defaultLabel(name: string): string {
  return name
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export abstract class BaseBlock {
  abstract readonly kind: BlockKind;
  abstract readonly name: string;
  abstract readonly category: BlockCategory;
  abstract readonly description: string;
  readonly structure: BlockStructure = 'simple';

  public readonly id: string;

  private readonly definitions = new Map<string, BlockParameter>();
  private readonly values = new Map<string, ParameterValue>();
  private locked = false;

  constructor(id?: string) {
    this.id = id || uuidv4();
    this.defineParameters();
  }

  /**
   * Declare the block's parameters with addParameter()
   */
  protected abstract defineParameters(): void;

  abstract execute(context: ExecutionContext): Promise<BlockOutcome>;

  // ==========================================================================
  // Parameters
  // ==========================================================================

  protected addParameter(
    name: string,
    type: ParameterType,
    defaultValue: ParameterValue,
    label: string = defaultLabel(name),
    options: ParameterOptions = {}
  ): void {
    this.definitions.set(name, { name, type, default: defaultValue, label, ...options });
    this.values.set(name, defaultValue);
  }

  /**
   * @throws UnknownParameterError for an undeclared name
   * @throws ValidationError when the value does not match the declared type,
   *   or while a run holds the block
   */
  setParameter(name: string, value: ParameterValue): void {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new UnknownParameterError(name, {
        operation: 'setParameter',
        blockId: this.id,
        kind: this.kind,
      });
    }

    if (this.locked) {
      throw new ValidationError(
        `Cannot change '${definition.label}' while the block is part of a running sequence`,
        { operation: 'setParameter', blockId: this.id, parameter: name }
      );
    }

    let schema = PARAMETER_SCHEMAS[definition.type];
    if (definition.default === null) {
      schema = schema.nullable();
    }
    if (!schema.safeParse(value).success) {
      throw new ValidationError(
        `${definition.label} must be ${TYPE_DESCRIPTIONS[definition.type]}`,
        { operation: 'setParameter', blockId: this.id, parameter: name, input: value }
      );
    }

    this.values.set(name, value);
  }

  /**
   * Apply several parameters at once
   */
  setParameters(parameters: Record<string, ParameterValue>): this {
    for (const [name, value] of Object.entries(parameters)) {
      this.setParameter(name, value);
    }
    return this;
  }

  hasParameter(name: string): boolean {
    return this.definitions.has(name);
  }

  getParameter(name: string): ParameterValue | undefined {
    return this.values.get(name);
  }

  getParameterDefinitions(): BlockParameter[] {
    return Array.from(this.definitions.values(), (definition) => ({ ...definition }));
  }

  getParameters(): Record<string, ParameterValue> {
    return Object.fromEntries(this.values);
  }

  protected getNumber(name: string): number {
    const value = this.values.get(name);
    if (typeof value !== 'number') {
      throw this.parameterTypeError(name, 'a number');
    }
    return value;
  }

  protected getString(name: string): string {
    const value = this.values.get(name);
    if (typeof value !== 'string') {
      throw this.parameterTypeError(name, 'a string');
    }
    return value;
  }

  protected getBoolean(name: string): boolean {
    const value = this.values.get(name);
    if (typeof value !== 'boolean') {
      throw this.parameterTypeError(name, 'a boolean');
    }
    return value;
  }

  protected getInstrumentName(name = 'instrument'): string {
    const value = this.values.get(name);
    if (typeof value !== 'string' || value.length === 0) {
      const label = this.definitions.get(name)?.label ?? name;
      throw new BlockExecutionError(`No instrument selected for '${label}'`, {
        operation: 'getInstrumentName',
        blockId: this.id,
      });
    }
    return value;
  }

  private parameterTypeError(name: string, expected: string): BlockExecutionError {
    return new BlockExecutionError(`Parameter '${name}' is not ${expected}`, {
      operation: 'getParameter',
      blockId: this.id,
      parameter: name,
    });
  }

  // ==========================================================================
  // Locking
  // ==========================================================================

  lock(): void {
    this.locked = true;
  }

  unlock(): void {
    this.locked = false;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  // ==========================================================================
  // Validation
  // ==========================================================================

  /**
   * Human-readable problems with the current parameter values
   */
  validate(): string[] {
    const errors: string[] = [];

    for (const parameter of this.definitions.values()) {
      const value = this.values.get(parameter.name);

      if (typeof value === 'number') {
        if (parameter.min !== undefined && value < parameter.min) {
          errors.push(`${parameter.label} must be >= ${parameter.min}`);
        }
        if (parameter.max !== undefined && value > parameter.max) {
          errors.push(`${parameter.label} must be <= ${parameter.max}`);
        }
      }

      const { choices } = parameter;
      if (parameter.type === 'choice' && choices && !choices.some((choice) => choice === value)) {
        errors.push(`${parameter.label} must be one of: ${choices.join(', ')}`);
      }

      if (parameter.type === 'instrument' && !value) {
        errors.push(`${parameter.label} is required`);
      }
    }

    errors.push(...this.validateConfiguration());
    return errors;
  }

  /**
   * Block-specific checks beyond parameter bounds
   */
  protected validateConfiguration(): string[] {
    return [];
  }

  /**
   * Syntax check for an expression-valued parameter
   */
  protected checkExpression(name: string): string | null {
    const value = this.values.get(name);
    const label = this.definitions.get(name)?.label ?? name;
    if (typeof value !== 'string') {
      return `${label} must be an expression`;
    }
    const problem = validateExpression(value);
    return problem ? `${label}: ${problem}` : null;
  }

  protected checkRequired(name: string): string | null {
    const value = this.values.get(name);
    const label = this.definitions.get(name)?.label ?? name;
    return typeof value === 'string' && value.trim().length > 0 ? null : `${label} is required`;
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  serialize(): SerializedBlock {
    return {
      kind: this.kind,
      id: this.id,
      parameters: this.getParameters(),
    };
  }

  describe(): BlockDescriptor {
    return {
      kind: this.kind,
      name: this.name,
      category: this.category,
      description: this.description,
      parameters: this.getParameterDefinitions(),
    };
  }

  toString(): string {
    return `${this.name}(${this.id})`;
  }

  protected success(details: Record<string, unknown> = {}): BlockOutcome {
    return { ...details, status: 'success' };
  }
}
