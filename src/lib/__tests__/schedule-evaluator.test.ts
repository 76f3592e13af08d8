/**
 * Unit tests for schedule-evaluator module
 * End-to-end evaluation of annotation sets against a fixed instant
 */

import { describe, it, expect } from 'vitest';
import { evaluateCronJob, evaluateDeployment, readObservedDeploymentState } from '@/lib/schedule-evaluator';

// Prague (CET) wall-clock instants in January 2026
const WED_0900 = Date.UTC(2026, 0, 14, 8, 0);
const WED_2000 = Date.UTC(2026, 0, 14, 19, 0);
const WED_2005 = Date.UTC(2026, 0, 14, 19, 5);
const SAT_2000 = Date.UTC(2026, 0, 17, 19, 0);
// Wednesday 2026-07-15 17:00 in Prague (CEST)
const WED_1700_SUMMER = Date.UTC(2026, 6, 15, 15, 0);

const WEEKDAYS = {
  'd8r/days': 'Mon,Tue,Wed,Thu,Fri',
  'd8r/startTime': '08:00',
  'd8r/stopTime': '16:00',
  'd8r/timeZone': 'Europe/Prague',
};

const DEPLOYMENT = { ...WEEKDAYS, 'd8r/downTimeReplicas': '1' };

describe('schedule-evaluator', () => {
  describe('evaluateDeployment', () => {
    it('should scale down after hours and record the original count', () => {
      const outcome = evaluateDeployment({ annotations: DEPLOYMENT, replicas: 2 }, WED_2000);

      expect(outcome).toEqual({
        status: 'decided',
        action: 'scale-down',
        decision: {
          action: 'scale-down',
          newReplicaCount: 1,
          annotationUpdates: { 'd8r/originalReplicas': '2' },
        },
        window: 'inactive',
        times: {
          now: {
            hour: 20,
            minute: 0,
            timeZone: 'Europe/Prague',
            utcOffsetMinutes: 60,
            epochMs: Date.UTC(2000, 0, 1, 19, 0),
          },
          start: {
            hour: 8,
            minute: 0,
            timeZone: 'Europe/Prague',
            utcOffsetMinutes: 60,
            epochMs: Date.UTC(2000, 0, 1, 7, 0),
          },
          stop: {
            hour: 16,
            minute: 0,
            timeZone: 'Europe/Prague',
            utcOffsetMinutes: 60,
            epochMs: Date.UTC(2000, 0, 1, 15, 0),
          },
        },
        today: 'Wed',
        warnings: [],
      });
    });

    it('should restore the original count during business hours', () => {
      const annotations = { ...DEPLOYMENT, 'd8r/originalReplicas': '2' };
      const outcome = evaluateDeployment({ annotations, replicas: 1 }, WED_0900);

      expect(outcome.status).toBe('decided');
      if (outcome.status !== 'decided') return;
      expect(outcome.action).toBe('scale-up');
      expect(outcome.decision.newReplicaCount).toBe(2);
      expect(outcome.window).toBe('active');
    });

    it('should take no action on an unscheduled day', () => {
      for (const replicas of [0, 1, 2, 10]) {
        const outcome = evaluateDeployment({ annotations: DEPLOYMENT, replicas }, SAT_2000);

        expect(outcome.status === 'decided' && outcome.action).toBe('no-action');
        expect(outcome.status === 'decided' && outcome.window).toBeNull();
        expect(outcome.status === 'decided' && outcome.times).toBeNull();
      }
    });

    it('should not validate window times on an unscheduled day', () => {
      const annotations = { ...DEPLOYMENT, 'd8r/startTime': 'x' };

      expect(evaluateDeployment({ annotations, replicas: 2 }, SAT_2000)).toEqual({
        status: 'decided',
        action: 'no-action',
        decision: { action: 'no-action', annotationUpdates: {} },
        window: null,
        times: null,
        today: 'Sat',
        warnings: [],
      });
    });

    it('should fail on a malformed downTimeReplicas at downtime', () => {
      const annotations = { ...WEEKDAYS, 'd8r/downTimeReplicas': 'abc' };

      expect(evaluateDeployment({ annotations, replicas: 2 }, WED_2000)).toEqual({
        status: 'failed',
        error: { code: 'INVALID_INTEGER_ANNOTATION', field: 'd8r/downTimeReplicas', value: 'abc' },
      });
    });

    it('should still restore the original count when downTimeReplicas is malformed', () => {
      const annotations = { ...WEEKDAYS, 'd8r/downTimeReplicas': 'abc', 'd8r/originalReplicas': '2' };
      const outcome = evaluateDeployment({ annotations, replicas: 1 }, WED_0900);

      expect(outcome.status === 'decided' && outcome.decision).toEqual({
        action: 'scale-up',
        newReplicaCount: 2,
        annotationUpdates: {},
      });
    });

    it('should opt out when schedule annotations are absent', () => {
      expect(evaluateDeployment({ annotations: {}, replicas: 2 }, WED_2000)).toEqual({
        status: 'opt-out',
        field: 'd8r/days',
      });
      expect(evaluateDeployment({ annotations: WEEKDAYS, replicas: 2 }, WED_2000)).toEqual({
        status: 'opt-out',
        field: 'd8r/downTimeReplicas',
      });
    });

    it('should fail on an unknown time zone', () => {
      const annotations = { ...DEPLOYMENT, 'd8r/timeZone': 'Europe/Atlantis' };

      expect(evaluateDeployment({ annotations, replicas: 2 }, WED_2000)).toEqual({
        status: 'failed',
        error: { code: 'INVALID_TIME_ZONE', timeZone: 'Europe/Atlantis' },
      });
    });

    it('should fail to scale up when the original count was never recorded', () => {
      const outcome = evaluateDeployment({ annotations: DEPLOYMENT, replicas: 1 }, WED_0900);

      expect(outcome).toEqual({ status: 'failed', error: { code: 'MISSING_ORIGINAL_REPLICAS' } });
    });

    it('should use the summer offset for the stop time', () => {
      const outcome = evaluateDeployment({ annotations: DEPLOYMENT, replicas: 3 }, WED_1700_SUMMER);

      expect(outcome.status === 'decided' && outcome.action).toBe('scale-down');
    });

    it('should match full day names by abbreviation', () => {
      const annotations = { ...DEPLOYMENT, 'd8r/days': 'Monday,Wednesday' };
      const outcome = evaluateDeployment({ annotations, replicas: 2 }, WED_2000);

      expect(outcome.status === 'decided' && outcome.action).toBe('scale-down');
    });

    it('should warn about overnight windows and treat them as downtime', () => {
      const annotations = { ...DEPLOYMENT, 'd8r/startTime': '22:00', 'd8r/stopTime': '06:00' };
      const outcome = evaluateDeployment({ annotations, replicas: 2 }, Date.UTC(2026, 0, 14, 22, 0));

      expect(outcome.status).toBe('decided');
      if (outcome.status !== 'decided') return;
      expect(outcome.warnings).toEqual(['overnight-window']);
      expect(outcome.window).toBe('inactive');
      expect(outcome.action).toBe('scale-down');
    });

    it('should treat an empty time zone as UTC', () => {
      const annotations = { ...DEPLOYMENT, 'd8r/timeZone': '', 'd8r/originalReplicas': '2' };
      // 09:30 UTC on Wednesday
      const outcome = evaluateDeployment({ annotations, replicas: 2 }, Date.UTC(2026, 0, 14, 9, 30));

      expect(outcome.status === 'decided' && outcome.window).toBe('active');
      expect(outcome.status === 'decided' && outcome.action).toBe('no-action');
    });
  });

  describe('evaluateCronJob', () => {
    it('should suspend after hours and then hold steady', () => {
      const first = evaluateCronJob({ annotations: WEEKDAYS, suspended: false }, WED_2000);
      const second = evaluateCronJob({ annotations: WEEKDAYS, suspended: true }, WED_2005);

      expect(first.status === 'decided' && first.decision).toEqual({
        action: 'suspend',
        suspend: true,
        annotationUpdates: {},
      });
      expect(second.status === 'decided' && second.action).toBe('no-action');
    });

    it('should resume during business hours', () => {
      const outcome = evaluateCronJob({ annotations: WEEKDAYS, suspended: true }, WED_0900);

      expect(outcome.status === 'decided' && outcome.decision.suspend).toBe(false);
    });

    it('should not require downTimeReplicas', () => {
      const outcome = evaluateCronJob({ annotations: WEEKDAYS, suspended: false }, WED_0900);

      expect(outcome.status).toBe('decided');
    });

    it('should stay silent about a malformed start time on an unscheduled day', () => {
      const annotations = { ...WEEKDAYS, 'd8r/startTime': 'x' };
      const outcome = evaluateCronJob({ annotations, suspended: false }, SAT_2000);

      expect(outcome.status === 'decided' && outcome.action).toBe('no-action');
    });

    it('should still require a known time zone on an unscheduled day', () => {
      const annotations = { ...WEEKDAYS, 'd8r/timeZone': 'Europe/Atlantis' };

      expect(evaluateCronJob({ annotations, suspended: false }, SAT_2000).status).toBe('failed');
    });

    it('should fail on a malformed start time', () => {
      const annotations = { ...WEEKDAYS, 'd8r/startTime': '8' };

      expect(evaluateCronJob({ annotations, suspended: false }, WED_2000)).toEqual({
        status: 'failed',
        error: { code: 'INVALID_TIME_FORMAT', field: 'd8r/startTime', value: '8' },
      });
    });
  });

  describe('readObservedDeploymentState', () => {
    it('should read the recorded original count', () => {
      expect(readObservedDeploymentState({ 'd8r/originalReplicas': '4' }, 1)).toEqual({
        currentReplicas: 1,
        originalReplicas: 4,
        originalReplicasRaw: '4',
      });
    });

    it('should keep an unparsable value as raw only', () => {
      expect(readObservedDeploymentState({ 'd8r/originalReplicas': 'x' }, 1)).toEqual({
        currentReplicas: 1,
        originalReplicasRaw: 'x',
      });
    });

    it('should report only the current count when nothing was recorded', () => {
      expect(readObservedDeploymentState({}, 2)).toEqual({ currentReplicas: 2 });
    });
  });
});
