import { describe, it, expect, vi } from 'vitest';
import { ValidationError } from '../../../utils/errors.js';
import { DelayBlock } from '../action-blocks.js';
import {
  BlockRegistry,
  createBlock,
  deserializeBlock,
  getBlockCatalog,
  getBlockCategories,
} from '../block-registry.js';

describe('block registry', () => {
  it('creates blocks by kind tag', () => {
    const block = createBlock('delay', 'd-1');
    expect(block).toBeInstanceOf(DelayBlock);
    expect(block.id).toBe('d-1');
  });

  it('accepts legacy class names', () => {
    expect(createBlock('TryExceptBlock').kind).toBe('try');
  });

  it('throws for unknown kinds', () => {
    expect(() => createBlock('teleport')).toThrow(ValidationError);
    expect(() => createBlock('teleport')).toThrow('Unknown block kind: teleport');
  });

  describe('deserializeBlock', () => {
    it('rebuilds a block from its record', () => {
      const block = deserializeBlock({ kind: 'delay', id: 'b1', parameters: { duration: 2 } });
      expect(block?.serialize()).toEqual({ kind: 'delay', id: 'b1', parameters: { duration: 2 } });
    });

    it('reads legacy records', () => {
      const block = deserializeBlock({
        type: 'SetVoltageBlock',
        block_id: 'legacy-1',
        parameters: { instrument: 'PSU1', voltage: 3.3 },
      });
      expect(block?.kind).toBe('set_voltage');
      expect(block?.id).toBe('legacy-1');
      expect(block?.getParameter('voltage')).toBe(3.3);
    });

    it('returns null for an unknown kind', () => {
      expect(deserializeBlock({ kind: 'teleport', id: 'x', parameters: {} })).toBeNull();
    });

    it('skips undeclared parameters and reports them', () => {
      const onUnknownParameter = vi.fn();
      const block = deserializeBlock(
        { kind: 'delay', parameters: { duration: 3, speed: 9 } },
        { onUnknownParameter }
      );

      expect(block?.getParameters()).toEqual({ duration: 3 });
      expect(onUnknownParameter).toHaveBeenCalledTimes(1);
      expect(onUnknownParameter.mock.calls[0][0]).toBe('speed');
    });

    it('raises on a value of the wrong type', () => {
      expect(() => deserializeBlock({ kind: 'delay', parameters: { duration: 'x' } })).toThrow(
        'Duration (seconds) must be a number'
      );
    });
  });

  describe('catalog', () => {
    it('describes every kind', () => {
      const kinds = getBlockCatalog().map((entry) => entry.kind);
      expect(kinds).toHaveLength(21);
      expect(kinds).toContain('instrument_command');
      expect(kinds).toContain('data_transform');
    });

    it('groups display names by category', () => {
      const categories = getBlockCategories();
      expect(categories['Power Supply']).toEqual(['Set Voltage', 'Set Current', 'Output Enable']);
      expect(categories.Data).toEqual(['Log Data', 'Math Operation', 'Data Transform']);
      expect(categories.Variables).toEqual(['Set Variable']);
    });
  });

  it('lets a private registry override a factory', () => {
    const registry = new BlockRegistry();
    registry.register('delay', (id) => new DelayBlock(id ?? 'fixed-id'));

    expect(registry.create('delay').id).toBe('fixed-id');
    expect(registry.has('comment')).toBe(false);
    expect(registry.deserialize({ kind: 'comment', parameters: {} })).toBeNull();
  });
});
