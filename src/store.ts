import { z } from 'zod';
import { StoreLoadError } from './errors.js';
import { Project, ReferableObject } from './types.js';

const projectSchema = z.object({
  id: z.number().int(),
  path: z.string().min(1),
  name: z.string()
});

const objectSchema = z.object({
  id: z.number().int(),
  iid: z.number().int(),
  projectId: z.number().int(),
  title: z.string()
});

const storeDataSchema = z.object({
  projects: z.array(projectSchema),
  issues: z.array(objectSchema).default([]),
  mergeRequests: z.array(objectSchema).default([]),
  snippets: z.array(objectSchema).default([])
});

export type StoreData = z.infer<typeof storeDataSchema>;

/**
 * Kinds of objects the store holds, named as in the data file
 */
export type ObjectKind = 'issues' | 'mergeRequests' | 'snippets';

const OBJECT_KINDS: readonly ObjectKind[] = ['issues', 'mergeRequests', 'snippets'];

function objectKey(projectId: number, iid: number): string {
  return `${projectId}:${iid}`;
}

/**
 * In-memory store of projects and their referable objects.
 * Read-only once built.
 */
export class ReferenceStore {
  private projectsById = new Map<number, Project>();
  private projectsByPath = new Map<string, Project>();
  private objects: Record<ObjectKind, Map<string, ReferableObject>> = {
    issues: new Map(),
    mergeRequests: new Map(),
    snippets: new Map()
  };

  constructor(data: StoreData) {
    for (const project of data.projects) {
      this.projectsById.set(project.id, project);
      // Paths resolve case-insensitively
      this.projectsByPath.set(project.path.toLowerCase(), project);
    }
    for (const kind of OBJECT_KINDS) {
      for (const object of data[kind]) {
        this.objects[kind].set(objectKey(object.projectId, object.iid), object);
      }
    }
  }

  /**
   * Validate raw data (e.g. parsed JSON) and build a store from it
   */
  static fromJson(raw: unknown): ReferenceStore {
    const result = storeDataSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new StoreLoadError(`Invalid store data: ${details}`);
    }
    return new ReferenceStore(result.data);
  }

  projectById(id: number): Project | undefined {
    return this.projectsById.get(id);
  }

  projectByPath(path: string): Project | undefined {
    return this.projectsByPath.get(path.toLowerCase());
  }

  findObject(kind: ObjectKind, projectId: number, iid: number): ReferableObject | undefined {
    return this.objects[kind].get(objectKey(projectId, iid));
  }

  listProjects(): Project[] {
    return Array.from(this.projectsById.values());
  }

  get projectCount(): number {
    return this.projectsById.size;
  }
}
