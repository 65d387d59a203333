import { describe, expect, it } from 'vitest';
import * as api from './index.js';

describe('package entry point', () => {
  it('should expose the engine and the modules it is built from', () => {
    expect(typeof api.WorkflowEngine).toBe('function');
    expect(typeof api.ArtifactStore).toBe('function');
    expect(typeof api.assembleSpecification).toBe('function');
    expect(typeof api.computeDiff).toBe('function');
    expect(typeof api.exportToTracker).toBe('function');
    expect(typeof api.createArtifactServer).toBe('function');
    expect(api.PHASE_IDS).toEqual(['validation', 'scope', 'architecture', 'work-items']);
  });
});
