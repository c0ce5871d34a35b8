import { promises as fs } from 'node:fs';

import { z } from 'zod';

import { SwitchyardError } from './errors';
import { namespaceDescriptorSchema, type NamespaceDescriptor } from './schema';

export interface NamespaceDirectory {
  describe(ids: string[]): Promise<NamespaceDescriptor[]>;
}

const registrySchema = z.union([
  z.array(namespaceDescriptorSchema),
  z.object({ namespaces: z.array(namespaceDescriptorSchema) })
]);

/** Known names and descriptions; ids missing from the registry describe themselves. */
export class StaticNamespaceDirectory implements NamespaceDirectory {
  private readonly entries: Map<string, NamespaceDescriptor>;

  constructor(descriptors: NamespaceDescriptor[] = []) {
    this.entries = new Map(descriptors.map((descriptor) => [descriptor.id, descriptor]));
  }

  async describe(ids: string[]): Promise<NamespaceDescriptor[]> {
    const unique = [...new Set(ids)];
    return unique.map((id) => this.entries.get(id) ?? { id, name: id });
  }
}

export async function loadNamespaceRegistry(filePath: string): Promise<StaticNamespaceDirectory> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf8'));
  } catch (err) {
    throw new SwitchyardError(
      `Failed to read namespace registry ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      'NAMESPACE_REGISTRY_INVALID'
    );
  }
  const parsed = registrySchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new SwitchyardError(
      `Namespace registry ${filePath} is invalid: ${details.join('; ')}`,
      'NAMESPACE_REGISTRY_INVALID'
    );
  }
  const descriptors = Array.isArray(parsed.data) ? parsed.data : parsed.data.namespaces;
  return new StaticNamespaceDirectory(descriptors);
}
