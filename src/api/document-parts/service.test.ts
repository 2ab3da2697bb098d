import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError, ValidationError } from '../errors.ts';
import { ResourceStore, newDocument, newProject, newWorkItem } from '../store/store.ts';
import { declareModule } from '../visibility/state-machine.ts';
import { addParts, linkWorkItems, listParts } from './service.ts';
import type { AddPartRequest, PlacementResult } from './types.ts';

const DOC = 'demo/_default/Spec';
const OTHER_DOC = 'demo/_default/Other';

function place(workItemId: string, previousPartId?: string): AddPartRequest {
  return { resourceType: 'document_parts', workItemId, previousPartId };
}

describe('document parts service', () => {
  let store: ResourceStore;

  beforeEach(() => {
    store = new ResourceStore();
    store.addProject(newProject({ id: 'demo', name: 'Demo', trackerPrefix: 'DEMO' }));
    store.addDocument(newDocument({ projectId: 'demo', spaceId: '_default', name: 'Spec', title: 'Spec' }));
    store.addDocument(newDocument({ projectId: 'demo', spaceId: '_default', name: 'Other', title: 'Other' }));

    for (const localId of ['DEMO-1', 'DEMO-2', 'DEMO-3', 'DEMO-4']) {
      const wi = newWorkItem('demo', localId, { title: localId, type: 'requirement' });
      declareModule(wi, DOC);
      store.addWorkItem(wi);
    }
    const heading = newWorkItem('demo', 'DEMO-H', { title: 'Safety', type: 'heading' });
    declareModule(heading, DOC);
    store.addWorkItem(heading);

    const elsewhere = newWorkItem('demo', 'DEMO-5', { title: 'elsewhere', type: 'requirement' });
    declareModule(elsewhere, OTHER_DOC);
    store.addWorkItem(elsewhere);
    store.addWorkItem(newWorkItem('demo', 'DEMO-6', { title: 'loose', type: 'requirement' }));
  });

  describe('addParts', () => {
    it('appends the first item and makes it visible', () => {
      const [part] = addParts(store, DOC, [place('demo/DEMO-1')]);

      expect(part).toMatchObject({
        id: 'demo/_default/Spec/workitem_DEMO-1',
        documentId: DOC,
        partType: 'workitem',
        workItemId: 'demo/DEMO-1',
        position: 1,
        previousPartId: null,
      });
      const wi = store.requireWorkItem('demo/DEMO-1');
      expect(wi.isInDocument).toBe(true);
      expect(wi.documentPosition).toBe(1);
      expect(wi.outlineNumber).toBe('FC-1.1-1');
      expect(store.recycleBin(DOC).map((item) => item.id)).toEqual([
        'demo/DEMO-2',
        'demo/DEMO-3',
        'demo/DEMO-4',
        'demo/DEMO-H',
      ]);
    });

    it('numbers appended items by position', () => {
      addParts(store, DOC, [place('demo/DEMO-1'), place('demo/DEMO-2')]);
      expect(store.requireWorkItem('demo/DEMO-2').outlineNumber).toBe('FC-1.1-2');
    });

    it('inserts after the previous part and shifts the rest', () => {
      const [first] = addParts(store, DOC, [place('demo/DEMO-1'), place('demo/DEMO-2')]);
      const [inserted] = addParts(store, DOC, [place('demo/DEMO-3', first?.id)]);

      expect(inserted?.position).toBe(2);
      expect(store.requireWorkItem('demo/DEMO-3').outlineNumber).toBe('FC-1.1-2');
      expect(store.requireWorkItem('demo/DEMO-2').documentPosition).toBe(3);
      expect(listParts(store, DOC).map((p) => p.workItemId)).toEqual(['demo/DEMO-1', 'demo/DEMO-3', 'demo/DEMO-2']);
    });

    it('appends when the previous part is unknown', () => {
      addParts(store, DOC, [place('demo/DEMO-1')]);
      const [part] = addParts(store, DOC, [place('demo/DEMO-2', 'demo/_default/Spec/workitem_NOPE-1')]);
      expect(part?.position).toBe(2);
    });

    it('moves an item that is already placed', () => {
      addParts(store, DOC, [place('demo/DEMO-1'), place('demo/DEMO-2'), place('demo/DEMO-3')]);
      const [moved] = addParts(store, DOC, [place('demo/DEMO-1')]);

      expect(moved?.position).toBe(3);
      expect(store.requireWorkItem('demo/DEMO-1').outlineNumber).toBe('FC-1.1-3');
      expect(store.requireWorkItem('demo/DEMO-2').documentPosition).toBe(1);
      expect(listParts(store, DOC).map((p) => p.position)).toEqual([1, 2, 3]);
      expect(listParts(store, DOC).map((p) => p.workItemId)).toEqual(['demo/DEMO-2', 'demo/DEMO-3', 'demo/DEMO-1']);
    });

    it('rejects an item whose module is another document', () => {
      expect(() => addParts(store, DOC, [place('demo/DEMO-5')])).toThrow(
        `WorkItem module (${OTHER_DOC}) does not match document (${DOC})`,
      );
      expect(store.requireWorkItem('demo/DEMO-5').isInDocument).toBe(false);
      expect(store.requireDocument(DOC).parts).toEqual([]);
    });

    it('rejects an item without a module', () => {
      expect(() => addParts(store, DOC, [place('demo/DEMO-6')])).toThrow('WorkItem demo/DEMO-6 has no module relationship');
    });

    it('validates the request', () => {
      expect(() => addParts(store, DOC, [{ resourceType: 'parts', workItemId: 'demo/DEMO-1' }])).toThrow(
        "Resource type must be 'document_parts'",
      );
      expect(() => addParts(store, DOC, [{ resourceType: 'document_parts' }])).toThrow('workItem relationship is required');
      expect(() =>
        addParts(store, DOC, [{ resourceType: 'document_parts', partType: 'heading', workItemId: 'demo/DEMO-1' }]),
      ).toThrow('Unsupported part type: heading');
      expect(() => addParts(store, DOC, [place('demo/DEMO-99')])).toThrow(NotFoundError);
      expect(() => addParts(store, 'demo/_default/Missing', [place('demo/DEMO-1')])).toThrow(NotFoundError);
    });

    it('keeps earlier placements when a later one in the batch fails', () => {
      expect(() => addParts(store, DOC, [place('demo/DEMO-1'), place('demo/DEMO-5'), place('demo/DEMO-2')])).toThrow(
        ValidationError,
      );
      expect(store.requireWorkItem('demo/DEMO-1').isInDocument).toBe(true);
      expect(store.requireWorkItem('demo/DEMO-2').isInDocument).toBe(false);
    });

    it('reports each placement', () => {
      const results: PlacementResult[] = [];
      addParts(store, DOC, [place('demo/DEMO-1'), place('demo/DEMO-2')], (result) => results.push(result));

      expect(results).toEqual([
        { partId: 'demo/_default/Spec/workitem_DEMO-1', workItemId: 'demo/DEMO-1', position: 1, outlineNumber: 'FC-1.1-1' },
        { partId: 'demo/_default/Spec/workitem_DEMO-2', workItemId: 'demo/DEMO-2', position: 2, outlineNumber: 'FC-1.1-2' },
      ]);
    });
  });

  describe('headings', () => {
    it('gives heading items a heading part and a section outline', () => {
      const [part] = addParts(store, DOC, [place('demo/DEMO-H')]);
      expect(part?.id).toBe('demo/_default/Spec/heading_DEMO-H');
      expect(part?.partType).toBe('heading');
      expect(store.requireWorkItem('demo/DEMO-H').outlineNumber).toBe('1.1');
    });

    it('numbers items inserted after a heading as its children', () => {
      const [heading] = addParts(store, DOC, [place('demo/DEMO-H')]);
      addParts(store, DOC, [place('demo/DEMO-1', heading?.id)]);
      const [second] = addParts(store, DOC, [place('demo/DEMO-2', heading?.id)]);

      expect(store.requireWorkItem('demo/DEMO-1').outlineNumber).toBe('1.1-1');
      expect(store.requireWorkItem('demo/DEMO-2').outlineNumber).toBe('1.1-2');
      expect(second?.position).toBe(2);
      expect(store.requireWorkItem('demo/DEMO-1').documentPosition).toBe(3);
    });
  });

  describe('listParts', () => {
    it('shows nothing until items are placed', () => {
      expect(listParts(store, DOC)).toEqual([]);
      addParts(store, DOC, [place('demo/DEMO-1')]);
      expect(listParts(store, DOC).map((p) => p.id)).toEqual(['demo/_default/Spec/workitem_DEMO-1']);
    });
  });

  describe('linkWorkItems', () => {
    it('records a parent link without changing visibility', () => {
      const links = linkWorkItems(store, 'demo/DEMO-2', [
        { resourceType: 'linkedworkitems', role: 'parent', targetWorkItemId: 'demo/DEMO-1' },
      ]);

      expect(links).toEqual([
        { id: 'demo/DEMO-2/parent/demo/DEMO-1', workItemId: 'demo/DEMO-2', role: 'parent', targetId: 'demo/DEMO-1' },
      ]);
      const child = store.requireWorkItem('demo/DEMO-2');
      expect(child.parentWorkItemId).toBe('demo/DEMO-1');
      expect(child.isInDocument).toBe(false);
    });

    it('nests a placed child under its placed parent', () => {
      linkWorkItems(store, 'demo/DEMO-2', [{ resourceType: 'linkedworkitems', targetWorkItemId: 'demo/DEMO-1' }]);
      addParts(store, DOC, [place('demo/DEMO-1'), place('demo/DEMO-2')]);
      expect(store.requireWorkItem('demo/DEMO-2').outlineNumber).toBe('FC-1.1-1.2');
    });

    it('leaves the parent alone for other roles', () => {
      linkWorkItems(store, 'demo/DEMO-2', [
        { resourceType: 'linkedworkitems', role: 'relates_to', targetWorkItemId: 'demo/DEMO-1' },
      ]);
      expect(store.requireWorkItem('demo/DEMO-2').parentWorkItemId).toBeNull();
    });

    it('validates link requests', () => {
      expect(() => linkWorkItems(store, 'demo/DEMO-2', [{ resourceType: 'links', targetWorkItemId: 'demo/DEMO-1' }])).toThrow(
        "Resource type must be 'linkedworkitems'",
      );
      expect(() =>
        linkWorkItems(store, 'demo/DEMO-2', [{ resourceType: 'linkedworkitems', targetWorkItemId: 'demo/DEMO-99' }]),
      ).toThrow(NotFoundError);
      expect(() => linkWorkItems(store, 'demo/DEMO-99', [])).toThrow(NotFoundError);
    });
  });
});
