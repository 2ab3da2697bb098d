/**
 * Mock-only inspection endpoints. They expose the internal visibility state
 * that the public representation hides, so integration tests can assert on
 * the recycle bin directly.
 */

import type { FastifyInstance } from 'fastify';
import { isInRecycleBin } from '../visibility/state-machine.ts';
import type { RouteOptions } from './shared.ts';

interface WildcardParams {
  '*': string;
}

export async function debugRoutesPlugin(app: FastifyInstance, opts: RouteOptions): Promise<void> {
  const { store } = opts;

  app.get<{ Params: WildcardParams }>('/mock/debug/workitem-states/*', async (req) => {
    return store.read((s) => {
      const workItem = s.requireWorkItem(req.params['*']);
      return {
        id: workItem.id,
        title: workItem.attributes.title,
        type: workItem.attributes.type,
        in_document: workItem.isInDocument,
        outline_number: workItem.outlineNumber,
        document_position: workItem.documentPosition,
        in_recycle_bin: isInRecycleBin(workItem),
        parent_workitem_id: workItem.parentWorkItemId,
        has_module: workItem.module !== null,
        module_id: workItem.module,
      };
    });
  });

  // Unknown documents simply have an empty bin.
  app.get<{ Params: WildcardParams }>('/mock/debug/recycle-bin/*', async (req) => {
    const documentId = req.params['*'];
    return store.read((s) => {
      const items = s.recycleBin(documentId).map((wi) => ({
        id: wi.id,
        title: wi.attributes.title,
        type: wi.attributes.type,
        in_recycle_bin: true,
        has_module: true,
        is_in_document: wi.isInDocument,
      }));
      return { document_id: documentId, recycle_bin_count: items.length, items };
    });
  });
}
