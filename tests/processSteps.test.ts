import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import { parseProcessSteps, RecordValidationError, upgradeProcessSteps } from '../src/lib/records';

beforeEach(() => {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  jest.restoreAllMocks();
});

const currentStep = {
  id: 'current',
  timing_basis: 'per_unit',
  quantity_source: 'cells',
  yield_fraction: 0.98,
  entry_mode: 'per_unit',
  batch_units: 1,
  batch_seconds: 0,
  time_per_unit_s: 4,
  setup_time_s_per_array: 0,
  operators: [],
};

describe('upgradeProcessSteps', () => {
  test('turns an operator head count into empty slots and fills defaults', () => {
    const original = { id: 'old', operators: 2 };
    const { steps, upgraded } = upgradeProcessSteps([original]);

    expect(upgraded).toBe(true);
    expect(steps[0]).toEqual({
      id: 'old',
      operators: [{ operator_id: null }, { operator_id: null }],
      timing_basis: 'per_array',
      quantity_source: 'array',
      yield_fraction: 1.0,
      entry_mode: 'per_unit',
      batch_units: 1.0,
      batch_seconds: 0.0,
      time_per_unit_s: 0.0,
      setup_time_s_per_array: 0.0,
    });
    expect(original.operators).toBe(2);
  });

  test('copies the old entry mode key', () => {
    const { entry_mode: _removed, ...withoutMode } = currentStep;
    const upgraded = upgradeProcessSteps({ process: [{ ...withoutMode, timing_entry_mode: 'per_batch' }] });
    expect(upgraded.steps[0]['entry_mode']).toBe('per_batch');
    expect(upgraded.upgraded).toBe(true);
  });

  test('current records are left alone', () => {
    const { steps, upgraded } = upgradeProcessSteps([currentStep]);
    expect(upgraded).toBe(false);
    expect(steps[0]).toEqual(currentStep);
  });

  test('no process list is an empty list', () => {
    expect(upgradeProcessSteps({})).toEqual({ steps: [], upgraded: false });
  });

  test('a process value that is not a list throws', () => {
    expect(() => upgradeProcessSteps({ process: 'weld' })).toThrow(RecordValidationError);
  });
});

describe('parseProcessSteps', () => {
  test('maps stored records to typed steps', () => {
    const [step] = parseProcessSteps([
      {
        name: 'Bypass attach',
        level: 'Diode',
        timing_basis: 'Diode',
        entry_mode: 'PER_BATCH',
        batch_time_value: '2',
        batch_time_unit: 'minutes',
        batch_units: 10,
        yield_fraction: 0.95,
        operators: [{ operator_id: 'OP-1' }, { operator_id: ' ' }],
      },
    ]);

    expect(step.id).toBe('Bypass attach');
    expect(step.level).toBe('diode');
    expect(step.timingBasis).toBe('diode');
    expect(step.entryMode).toBe('per_batch');
    expect(step.batchTimeValue).toBe(2);
    expect(step.batchTimeUnit).toBe('minutes');
    expect(step.timeUnit).toBe('seconds');
    expect(step.cellsPerArrayForStep).toBe(1);
    expect(step.operators).toEqual([{ operatorId: 'OP-1' }, { operatorId: null }]);
    expect(step).not.toHaveProperty('batchSeconds');
  });

  test('steps without an id or name are skipped', () => {
    const steps = parseProcessSteps([{ timing_basis: 'cell' }, { id: 'keep' }]);
    expect(steps.map((step) => step.id)).toEqual(['keep']);
    expect(console.warn).toHaveBeenCalledWith('[process] Skipped process step', '{"index":0,"reasons":["Step needs an id or a name"]}');
  });
});
