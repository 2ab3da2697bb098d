/**
 * Seeds a store with the fixture data clients and tests expect to find:
 * users, projects, documents, hidden (recycle-bin) work items and one placed
 * heading to nest requirements under.
 */

import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { declareModule, placeInDocument } from '../visibility/state-machine.ts';
import { newDocument, newProject, newUser, newWorkItem, shortWorkItemId, type ResourceStore } from './store.ts';

const SeedDataSchema = z.object({
  users: z.array(z.object({ id: z.string(), name: z.string(), email: z.string().optional() })),
  projects: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      description: z.string().optional(),
      trackerPrefix: z.string().optional(),
    }),
  ),
  documents: z.array(
    z.object({
      projectId: z.string(),
      spaceId: z.string(),
      name: z.string(),
      title: z.string(),
      summary: z.string(),
    }),
  ),
  workItems: z.array(
    z.object({
      projectId: z.string(),
      id: z.string(),
      type: z.string(),
      title: z.string(),
      description: z.string(),
      status: z.string(),
      priority: z.string(),
      severity: z.string().optional(),
      module: z.string().optional(),
    }),
  ),
  generatedWorkItems: z.object({
    projectId: z.string(),
    prefix: z.string(),
    firstNumber: z.number().int(),
    count: z.number().int().nonnegative(),
    documents: z.array(z.object({ id: z.string(), type: z.string() })).min(1),
    statuses: z.array(z.string()).min(1),
    priorities: z.array(z.string()).min(1),
    severities: z.array(z.string()).min(1),
  }),
  placedHeadings: z.array(
    z.object({
      projectId: z.string(),
      id: z.string(),
      title: z.string(),
      documentId: z.string(),
      outlineNumber: z.string(),
    }),
  ),
});

export type SeedData = z.infer<typeof SeedDataSchema>;

const __dirname = path.dirname(fileURLToPath(import.meta.url));

let cachedSeed: SeedData | null = null;

export function loadSeedData(): SeedData {
  if (!cachedSeed) {
    const raw: unknown = JSON.parse(readFileSync(path.join(__dirname, 'seed-data.json'), 'utf8'));
    cachedSeed = SeedDataSchema.parse(raw);
  }
  return cachedSeed;
}

function pick<T>(values: T[], index: number): T {
  const value = values[index % values.length];
  if (value === undefined) throw new Error('[Seed] empty option list');
  return value;
}

export function seedStore(store: ResourceStore, data: SeedData = loadSeedData()): void {
  for (const user of data.users) {
    store.addUser(newUser(user));
  }

  for (const project of data.projects) {
    store.addProject(newProject(project));
  }

  for (const doc of data.documents) {
    store.addDocument(
      newDocument({
        ...doc,
        homePageContent: { type: 'text/html', value: `<h1>${doc.title}</h1><p>${doc.summary}</p>` },
      }),
    );
  }

  const gen = data.generatedWorkItems;
  for (let i = 1; i <= gen.count; i++) {
    const doc = pick(gen.documents, i);
    const status = pick(gen.statuses, i);
    const workItem = newWorkItem(gen.projectId, `${gen.prefix}-${gen.firstNumber - 1 + i}`, {
      title: `Functional Safety Requirement ${i}`,
      type: doc.type,
      description: {
        type: 'text/html',
        value: `<p>Safety Attributes need to be filled out for requirement ${i}</p>`,
      },
      status,
      priority: pick(gen.priorities, i),
      severity: pick(gen.severities, i),
      author: 'admin',
      assignee: [status === 'done' ? 'jane.smith' : 'john.doe'],
    });
    declareModule(workItem, doc.id);
    store.addWorkItem(workItem);
  }

  for (const item of data.workItems) {
    const workItem = newWorkItem(item.projectId, item.id, {
      title: item.title,
      type: item.type,
      description: { type: 'text/html', value: item.description },
      status: item.status,
      priority: item.priority,
      severity: item.severity,
      author: 'admin',
      assignee: [item.status === 'done' ? 'jane.smith' : 'john.doe'],
    });
    if (item.module) declareModule(workItem, item.module);
    store.addWorkItem(workItem);
  }

  for (const heading of data.placedHeadings) {
    const document = store.requireDocument(heading.documentId);
    const workItem = newWorkItem(heading.projectId, heading.id, {
      title: heading.title,
      type: 'heading',
      status: 'open',
      author: 'admin',
    });
    declareModule(workItem, document.id);
    store.addWorkItem(workItem);

    const position = document.parts.length + 1;
    placeInDocument(workItem, document.id, position, heading.outlineNumber);
    store.insertPart(document, {
      id: `${document.id}/heading_${shortWorkItemId(workItem.id)}`,
      documentId: document.id,
      partType: 'heading',
      workItemId: workItem.id,
      position,
      previousPartId: null,
      createdAt: new Date(),
    });
  }
}
