import { describe, it, expect } from 'vitest';
import { ArtifactStore, UnresolvedReferenceError } from '../store/store.js';
import { capabilityInput, decisionInput, entityInput, workItemInput } from '../store/builders.js';
import { seedlingAnchor } from '../testing/fixtures.js';
import {
  LegacyFallbackExpiredError,
  assembleContext,
  assembleSpecification,
  attachWorkItems,
  compareArtifactIds,
  serializeSpecification,
} from './assembler.js';
import { renderSpecificationMarkdown } from './markdown.js';

const fixedNow = (): Date => new Date('2026-03-01T12:00:00.000Z');

function seedlingStore(): ArtifactStore {
  const store = new ArtifactStore({ now: fixedNow });
  store.append(capabilityInput('Invite members'));
  store.append(capabilityInput('Swap seedlings'));
  store.append(capabilityInput('Swap calendar'));
  store.append(decisionInput('Invite tokens', ['CAP-001']));
  store.append(decisionInput('Swap board', ['CAP-002']));
  store.append(entityInput('Invitation', ['DEC-001'], ['token', 'expiresAt']));
  store.append(workItemInput('Invite flow', ['CAP-001']));
  store.append(workItemInput('Swap board page', ['CAP-002'], { dependsOn: ['WI-001'] }));
  return store;
}

describe('compareArtifactIds', () => {
  it('should order by prefix, then numerically', () => {
    expect(['WI-010', 'CAP-002', 'WI-002', 'CAP-1000'].sort(compareArtifactIds)).toEqual([
      'CAP-002',
      'CAP-1000',
      'WI-002',
      'WI-010',
    ]);
  });
});

describe('assembleContext', () => {
  it('should resolve every reference to the full artifact', () => {
    const context = assembleContext(seedlingStore(), seedlingAnchor());

    expect(context.decisions.map((d) => [d.decision.id, d.serves.map((c) => c.fields.name)])).toEqual([
      ['DEC-001', ['Invite members']],
      ['DEC-002', ['Swap seedlings']],
    ]);
    expect(context.entities[0]?.serves[0]?.fields.title).toBe('Invite tokens');
    expect('workItems' in context).toBe(false);
  });

  it('should list a capability with no decision as uncovered', () => {
    const context = assembleContext(seedlingStore(), seedlingAnchor());

    expect(context.uncovered.map((capability) => capability.id)).toEqual(['CAP-003']);
  });

  it('should leave superseded artifacts out', () => {
    const store = seedlingStore();
    store.supersede('CAP-003', capabilityInput('Seasonal swap calendar'));

    const context = assembleContext(store, seedlingAnchor());

    expect(context.capabilities.map((capability) => capability.id)).toEqual([
      'CAP-001',
      'CAP-002',
      'CAP-004',
    ]);
  });

  it('should turn legacy text into placeholders before the cutoff', () => {
    const context = assembleContext(seedlingStore(), seedlingAnchor(), {
      legacy: { 'risk-assessment': ' Low risk overall. ' },
      legacyUntil: '2027-06-30',
      now: new Date('2026-03-01T12:00:00.000Z'),
    });

    expect(context.legacy).toEqual([
      {
        id: 'LEGACY-risk-assessment',
        stage: 'risk-assessment',
        text: 'Low risk overall.',
        removeAfter: '2027-06-30',
      },
    ]);
  });

  it('should refuse legacy text after the cutoff', () => {
    expect(() =>
      assembleContext(seedlingStore(), seedlingAnchor(), {
        legacy: { 'risk-assessment': 'Low risk overall.' },
        legacyUntil: '2027-06-30',
        now: new Date('2027-07-01T00:00:00.000Z'),
      })
    ).toThrow(LegacyFallbackExpiredError);
  });
});

describe('attachWorkItems', () => {
  it('should follow the given order and append the rest by ID', () => {
    const store = seedlingStore();
    store.append(workItemInput('Calendar view', ['CAP-003']));
    const context = assembleContext(store, seedlingAnchor());

    const spec = attachWorkItems(context, store.current('work-item'), ['WI-002']);

    expect(spec.workItems.map((item) => [item.position, item.workItem.id])).toEqual([
      [1, 'WI-002'],
      [2, 'WI-001'],
      [3, 'WI-003'],
    ]);
    expect(spec.workItems[0]?.implements.map((capability) => capability.fields.name)).toEqual([
      'Swap seedlings',
    ]);
    expect(spec.workItems[0]?.dependsOn.map((item) => item.id)).toEqual(['WI-001']);
  });

  it('should always carry a work item list, possibly empty', () => {
    const context = assembleContext(seedlingStore(), seedlingAnchor());

    expect(attachWorkItems(context, []).workItems).toEqual([]);
  });

  it('should reject a work item implementing an unknown capability', () => {
    const store = seedlingStore();
    const context = assembleContext(store, seedlingAnchor());
    store.supersede('CAP-001', capabilityInput('Invite members by referral'));
    const stale = assembleContext(store, seedlingAnchor());

    expect(() => attachWorkItems(stale, store.current('work-item'))).toThrow(
      UnresolvedReferenceError
    );
    expect(() => attachWorkItems(context, store.current('work-item'))).not.toThrow();
  });

  it('should resolve links to replaced artifacts through the store', () => {
    const store = seedlingStore();
    store.supersede('CAP-002', capabilityInput('Swap seedlings by season'));
    store.supersede('WI-001', workItemInput('Invite flow v2', ['CAP-001']));

    const spec = assembleSpecification(store, seedlingAnchor());
    const swapPage = spec.workItems.find((item) => item.workItem.id === 'WI-002');

    expect(swapPage?.implements.map((capability) => [capability.id, capability.supersededBy])).toEqual([
      ['CAP-002', 'CAP-004'],
    ]);
    expect(swapPage?.dependsOn.map((item) => item.id)).toEqual(['WI-003']);
  });

  it('should still reject a link no stored artifact answers', () => {
    const store = seedlingStore();
    const context = assembleContext(store, seedlingAnchor());
    const orphans = store
      .current('work-item')
      .filter((item) => item.id === 'WI-002')
      .map((item) => ({ ...item, implements: ['CAP-099'] }));

    expect(() => attachWorkItems(context, orphans, [], store)).toThrow(
      "Unresolved reference 'CAP-099' from 'WI-002': not a known capability"
    );
  });

  it('should reject an ordering that names an unknown work item', () => {
    const store = seedlingStore();
    const context = assembleContext(store, seedlingAnchor());

    expect(() => attachWorkItems(context, store.current('work-item'), ['WI-099'])).toThrow(
      "Unresolved reference 'WI-099' from 'work-item-ordering'"
    );
  });
});

describe('serializeSpecification', () => {
  it('should be byte-identical for identical store state', () => {
    const first = serializeSpecification(assembleSpecification(seedlingStore(), seedlingAnchor()));
    const second = serializeSpecification(assembleSpecification(seedlingStore(), seedlingAnchor()));

    expect(first).toBe(second);
  });

  it('should sort object keys', () => {
    const json = serializeSpecification(assembleSpecification(seedlingStore(), seedlingAnchor()));

    expect(json.startsWith('{\n  "anchor": {\n    "confirmed": true,\n')).toBe(true);
    expect(json.endsWith('}\n')).toBe(true);
  });
});

describe('renderSpecificationMarkdown', () => {
  it('should render resolved references by name', () => {
    const markdown = renderSpecificationMarkdown(
      assembleSpecification(seedlingStore(), seedlingAnchor())
    );
    const lines = markdown.split('\n');

    expect(lines[0]).toBe('# Resolved Specification');
    expect(lines).toContain('- Serves: CAP-001 (Invite members)');
    expect(lines).toContain('### 2. WI-002: Swap board page');
    expect(lines).toContain('- Depends on: WI-001');
    expect(lines).toContain('- CAP-003 (Swap calendar)');
  });
});
