import { describe, expect, it } from 'vitest';
import {
  TaskStatus,
  checkTransition,
  classifyStatus,
  dataReadyCode,
  describeStatus,
  failureCode,
  isFailure,
  isSuccess,
  isTerminal,
  milestonePredicate,
  successCode,
  terminalPredicate,
} from '../state-machine.js';
import type { TaskSnapshot } from '../types.js';

function snapshot(status: number): TaskSnapshot {
  return { taskId: 't', status, rawStatus: String(status), description: '', data: null };
}

describe('classifyStatus', () => {
  it('should classify download codes', () => {
    expect(classifyStatus('download', 100)).toBe('pending');
    expect(classifyStatus('download', 42)).toBe('pending');
    expect(classifyStatus('download', 110)).toBe('pending');
    expect(classifyStatus('download', 116)).toBe('pending');
    expect(classifyStatus('download', 117)).toBe('success');
    expect(classifyStatus('download', 118)).toBe('failure');
  });

  it('should classify upload codes', () => {
    for (const code of [100, 110, 111, 112, 113]) {
      expect(classifyStatus('upload', code)).toBe('pending');
    }
    expect(classifyStatus('upload', 114)).toBe('success');
    expect(classifyStatus('upload', 115)).toBe('failure');
    for (const code of [116, 117, 118]) {
      expect(classifyStatus('upload', code)).toBe('success');
    }
  });

  it('should classify compute codes', () => {
    expect(classifyStatus('compute', 100)).toBe('pending');
    expect(classifyStatus('compute', 101)).toBe('pending');
    expect(classifyStatus('compute', 200)).toBe('success');
    expect(classifyStatus('compute', 400)).toBe('failure');
  });

  it('should report codes outside the table as unknown', () => {
    expect(classifyStatus('download', 119)).toBe('unknown');
    expect(classifyStatus('upload', 300)).toBe('unknown');
    expect(classifyStatus('compute', 500)).toBe('unknown');
    expect(classifyStatus('compute', 150)).toBe('unknown');
    expect(classifyStatus('upload', 42)).toBe('unknown');
    expect(classifyStatus('upload', 109)).toBe('unknown');
    expect(classifyStatus('compute', 7)).toBe('unknown');
    expect(classifyStatus('compute', 99)).toBe('unknown');
    expect(classifyStatus('compute', 201)).toBe('unknown');
    expect(classifyStatus('compute', 300)).toBe('unknown');
    expect(classifyStatus('compute', 399)).toBe('unknown');
    expect(classifyStatus('download', Number.NaN)).toBe('unknown');
    expect(classifyStatus('upload', -1)).toBe('unknown');
  });
});

describe('terminal helpers', () => {
  it('should expose success and failure codes per category', () => {
    expect([successCode('download'), failureCode('download')]).toEqual([117, 118]);
    expect([successCode('upload'), failureCode('upload')]).toEqual([114, 115]);
    expect([successCode('compute'), failureCode('compute')]).toEqual([200, 400]);
  });

  it('should treat only success and failure codes as terminal', () => {
    expect(isTerminal('upload', TaskStatus.UploadFormUrlReady)).toBe(false);
    expect(isTerminal('upload', TaskStatus.UploadSuccess)).toBe(true);
    expect(isTerminal('upload', TaskStatus.UploadFailure)).toBe(true);
    expect(isSuccess('download', 117)).toBe(true);
    expect(isFailure('download', 117)).toBe(false);
    expect(isTerminal('download', 999)).toBe(false);
  });

  it('should give the data-ready code of transfers only', () => {
    expect(dataReadyCode('upload')).toBe(111);
    expect(dataReadyCode('download')).toBe(117);
    expect(dataReadyCode('compute')).toBeUndefined();
  });
});

describe('predicates', () => {
  it('should hold at terminal codes only', () => {
    const predicate = terminalPredicate('download');

    expect(predicate(snapshot(116))).toBe(false);
    expect(predicate(snapshot(117))).toBe(true);
    expect(predicate(snapshot(118))).toBe(true);
  });

  it('should hold once a milestone or a terminal code is reached', () => {
    const predicate = milestonePredicate('upload', 111);

    expect(predicate(snapshot(110))).toBe(false);
    expect(predicate(snapshot(111))).toBe(true);
    expect(predicate(snapshot(113))).toBe(true);
    expect(predicate(snapshot(115))).toBe(true);
  });
});

describe('checkTransition', () => {
  it('should accept forward moves and repeats', () => {
    expect(checkTransition('upload', undefined, 110)).toBe('ok');
    expect(checkTransition('upload', 110, 110)).toBe('ok');
    expect(checkTransition('upload', 111, 113)).toBe('ok');
    expect(checkTransition('upload', 113, 114)).toBe('ok');
  });

  it('should reject a code lower than the previous one', () => {
    expect(checkTransition('upload', 112, 111)).toBe('regression');
  });

  it('should keep terminal codes sticky', () => {
    expect(checkTransition('download', 117, 117)).toBe('ok');
    expect(checkTransition('download', 117, 118)).toBe('regression');
    expect(checkTransition('download', 118, 116)).toBe('regression');
  });
});

describe('describeStatus', () => {
  it('should describe known and unknown codes', () => {
    expect(describeStatus(111)).toBe('Form URL from Object Storage received');
    expect(describeStatus(42)).toBe('Unknown status 42');
  });
});
