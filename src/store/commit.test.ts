import { describe, expect, it } from 'vitest';
import {
  ArtifactStore,
  ArtifactValidationError,
  InvalidSupersedeError,
  UnresolvedReferenceError,
  capabilityInput,
  commitBatch,
  decisionInput,
  entityInput,
  workItemInput,
} from './index.js';

describe('commitBatch', () => {
  it('should rewrite batch refs to minted IDs', () => {
    const store = new ArtifactStore();
    const existing = store.append(capabilityInput('Invite members'));

    const result = commitBatch(store, [
      { ref: 'ent-member', input: entityInput('Member', ['dec-tokens']) },
      { ref: 'dec-tokens', input: decisionInput('Invite tokens', [existing.id]) },
    ]);

    expect(result.ids.get('dec-tokens')).toBe('DEC-001');
    expect(result.ids.get('ent-member')).toBe('ENT-001');
    expect(result.artifacts.map((a) => a.id)).toEqual(['DEC-001', 'ENT-001']);
    expect(store.require('ENT-001').serves).toEqual(['DEC-001']);
  });

  it('should order work items after the items they depend on', () => {
    const store = new ArtifactStore();
    const cap = store.append(capabilityInput('Invite members'));

    commitBatch(store, [
      { ref: 'wi-ui', input: workItemInput('Invite UI', [cap.id], { dependsOn: ['wi-api'] }) },
      { ref: 'wi-api', input: workItemInput('Invite API', [cap.id]) },
    ]);

    const ui = store.require('WI-002');
    expect(ui.type === 'work-item' ? ui.fields.dependsOn : []).toEqual(['WI-001']);
    expect(ui.summary).toBe('Invite UI');
  });

  it('should write nothing when a reference is unknown', () => {
    const store = new ArtifactStore();

    expect(() =>
      commitBatch(store, [
        { ref: 'cap-a', input: capabilityInput('A') },
        { ref: 'dec-a', input: decisionInput('A', ['cap-missing']) },
      ])
    ).toThrow(UnresolvedReferenceError);
    expect(store.size).toBe(0);
  });

  it('should refuse references to superseded artifacts', () => {
    const store = new ArtifactStore();
    const old = store.append(capabilityInput('Invite members'));
    store.supersede(old.id, capabilityInput('Invite by referral'));

    expect(() =>
      commitBatch(store, [{ ref: 'dec', input: decisionInput('Tokens', [old.id]) }])
    ).toThrow("Unresolved reference 'CAP-001' from 'dec': artifact is superseded");
  });

  it('should reject reference cycles', () => {
    const store = new ArtifactStore();
    const cap = store.append(capabilityInput('Invite members'));

    expect(() =>
      commitBatch(store, [
        { ref: 'a', input: workItemInput('A', [cap.id], { dependsOn: ['b'] }) },
        { ref: 'b', input: workItemInput('B', [cap.id], { dependsOn: ['a'] }) },
      ])
    ).toThrow('reference cycle in batch');
    expect(store.current('work-item')).toEqual([]);
  });

  it('should reject duplicate refs', () => {
    const store = new ArtifactStore();

    expect(() =>
      commitBatch(store, [
        { ref: 'cap', input: capabilityInput('A') },
        { ref: 'cap', input: capabilityInput('B') },
      ])
    ).toThrow(ArtifactValidationError);
  });

  it('should supersede when a pending artifact names a predecessor', () => {
    const store = new ArtifactStore();
    const old = store.append(capabilityInput('Invite members'));

    const { artifacts } = commitBatch(store, [
      { ref: 'cap', supersedes: old.id, input: capabilityInput('Invite by referral') },
    ]);

    expect(artifacts[0]?.supersedes).toBe('CAP-001');
    expect(store.isSuperseded('CAP-001')).toBe(true);
  });

  it('should write nothing when a link names an artifact of the wrong type', () => {
    const store = new ArtifactStore();
    const cap = store.append(capabilityInput('Invite members'));
    const dec = store.append(decisionInput('Invite tokens', [cap.id]));

    expect(() =>
      commitBatch(store, [
        { ref: 'wi-ok', input: workItemInput('Invite API', [cap.id]) },
        { ref: 'wi-bad', input: workItemInput('Token table', [dec.id]) },
      ])
    ).toThrow(
      "Unresolved reference 'DEC-001' from 'wi-bad': 'implements' must reference a capability, got decision"
    );
    expect(store.size).toBe(2);
    expect(store.has('WI-001')).toBe(false);
  });

  it('should check link types against refs in the same batch', () => {
    const store = new ArtifactStore();

    expect(() =>
      commitBatch(store, [
        { ref: 'cap', input: capabilityInput('Invite members') },
        { ref: 'ent', input: entityInput('Member', ['cap']) },
      ])
    ).toThrow(
      "Unresolved reference 'cap' from 'ent': 'serves' must reference a decision, got capability"
    );
    expect(store.size).toBe(0);
  });

  it('should only accept work items as dependencies', () => {
    const store = new ArtifactStore();
    const cap = store.append(capabilityInput('Invite members'));

    expect(() =>
      commitBatch(store, [
        { ref: 'wi-a', input: workItemInput('Invite API', [cap.id]) },
        { ref: 'wi-b', input: workItemInput('Invite UI', [cap.id], { dependsOn: [cap.id] }) },
      ])
    ).toThrow(
      "Unresolved reference 'CAP-001' from 'wi-b': 'dependsOn' must reference a work-item, got capability"
    );
    expect(store.size).toBe(1);
  });

  it('should write nothing when two drafts replace the same artifact', () => {
    const store = new ArtifactStore();
    const old = store.append(capabilityInput('Invite members'));

    expect(() =>
      commitBatch(store, [
        { ref: 'cap-a', supersedes: old.id, input: capabilityInput('Invite by referral') },
        { ref: 'cap-b', supersedes: old.id, input: capabilityInput('Invite by code') },
      ])
    ).toThrow(
      "Cannot supersede artifact CAP-001: 'cap-a' and 'cap-b' both replace it in one batch"
    );
    expect(store.size).toBe(1);
    expect(store.isSuperseded(old.id)).toBe(false);
  });

  it('should refuse a replacement of another type before writing', () => {
    const store = new ArtifactStore();
    const cap = store.append(capabilityInput('Invite members'));

    expect(() =>
      commitBatch(store, [
        { ref: 'cap-new', input: capabilityInput('Swap seedlings') },
        { ref: 'dec', supersedes: cap.id, input: decisionInput('Invite tokens', ['cap-new']) },
      ])
    ).toThrow("type mismatch: 'capability' cannot be replaced by 'decision'");
    expect(store.size).toBe(1);
  });

  it('should refuse superseding an already superseded artifact', () => {
    const store = new ArtifactStore();
    const old = store.append(capabilityInput('Invite members'));
    store.supersede(old.id, capabilityInput('Invite by referral'));

    expect(() =>
      commitBatch(store, [{ ref: 'cap', supersedes: old.id, input: capabilityInput('Again') }])
    ).toThrow(InvalidSupersedeError);
  });
});
