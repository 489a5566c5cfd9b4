import { describe, it, expect } from 'vitest';
import { InstrumentNotFoundError } from '../../../utils/errors.js';
import { FakeMultimeter, FakePowerSupply, RecordingDataSink } from '../../../test/fake-instruments.js';
import { ExecutionContext } from '../execution-context.js';

describe('ExecutionContext', () => {
  describe('instruments', () => {
    it('looks up registered instruments', () => {
      const psu = new FakePowerSupply();
      const context = new ExecutionContext({ instruments: { PSU1: psu } });
      context.registerInstrument('DMM1', new FakeMultimeter());

      expect(context.getInstrument('PSU1')).toBe(psu);
      expect(context.instrumentNames()).toEqual(['PSU1', 'DMM1']);
      expect(context.hasInstrument('DMM1')).toBe(true);
    });

    it('names the available instruments when one is missing', () => {
      const context = new ExecutionContext({
        instruments: new Map([['PSU1', new FakePowerSupply()]]),
      });

      expect(() => context.getInstrument('DMM9')).toThrow(InstrumentNotFoundError);
      expect(() => context.getInstrument('DMM9')).toThrow("Instrument 'DMM9' not found. Available: PSU1");
    });

    it('unregisters instruments', () => {
      const context = new ExecutionContext({ instruments: { PSU1: new FakePowerSupply() } });
      expect(context.unregisterInstrument('PSU1')).toBe(true);
      expect(context.unregisterInstrument('PSU1')).toBe(false);
      expect(context.instrumentNames()).toEqual([]);
    });
  });

  describe('variables', () => {
    it('returns the default for missing names', () => {
      const context = new ExecutionContext({ variables: { a: 1 } });
      expect(context.getVariable('a')).toBe(1);
      expect(context.getVariable('missing')).toBeUndefined();
      expect(context.getVariable('missing', 42)).toBe(42);
    });

    it('keeps null values distinct from missing ones', () => {
      const context = new ExecutionContext();
      context.setVariable('empty', null);
      expect(context.hasVariable('empty')).toBe(true);
      expect(context.getVariable('empty', 7)).toBeNull();
    });

    it('snapshots, deletes and clears', () => {
      const context = new ExecutionContext({ variables: { a: 1, b: 'two' } });
      expect(context.deleteVariable('a')).toBe(true);
      expect(context.snapshot()).toEqual({ b: 'two' });

      context.clearVariables();
      expect(context.snapshot()).toEqual({});
    });

    it('reset clears variables and restarts the clock', async () => {
      const context = new ExecutionContext({ variables: { a: 1 } });
      await new Promise((resolve) => setTimeout(resolve, 20));
      expect(context.getElapsedTime()).toBeGreaterThan(0);

      context.reset();
      expect(context.snapshot()).toEqual({});
      expect(context.getElapsedTime()).toBeLessThan(0.02);
    });
  });

  describe('derive', () => {
    it('copies variables and adds bindings without leaking back', () => {
      const psu = new FakePowerSupply();
      const parent = new ExecutionContext({ instruments: { PSU1: psu }, variables: { a: 1 } });
      const child = parent.derive({ x: 5 });

      child.setVariable('a', 99);

      expect(child.getVariable('x')).toBe(5);
      expect(child.getInstrument('PSU1')).toBe(psu);
      expect(parent.getVariable('a')).toBe(1);
      expect(parent.hasVariable('x')).toBe(false);
    });
  });

  describe('data sink', () => {
    it('forwards records when a sink is attached', async () => {
      const sink = new RecordingDataSink();
      const context = new ExecutionContext();

      await expect(context.logData({ v: 1 })).resolves.toBe(false);

      context.setDataSink(sink);
      await expect(context.logData({ v: 2 })).resolves.toBe(true);
      expect(sink.records).toEqual([{ v: 2 }]);
      expect(context.hasDataSink).toBe(true);
    });
  });

  it('summarizes itself as JSON', () => {
    const context = new ExecutionContext({
      instruments: { PSU1: new FakePowerSupply() },
      variables: { v: 3.3 },
    });
    const summary = context.toJSON();
    expect(summary.instruments).toEqual(['PSU1']);
    expect(summary.variables).toEqual({ v: 3.3 });
  });
});
