// @module: server-readiness
// @tags: health, lifecycle

export type ReadinessPhase = 'starting' | 'ready' | 'draining';

export interface ReadinessController {
  markReady(): void;
  markDraining(): void;
  phase(): ReadinessPhase;
}

export const createReadinessController = (): ReadinessController => {
  let current: ReadinessPhase = 'starting';

  return {
    markReady(): void {
      if (current === 'starting') {
        current = 'ready';
      }
    },
    markDraining(): void {
      current = 'draining';
    },
    phase: () => current,
  };
};
