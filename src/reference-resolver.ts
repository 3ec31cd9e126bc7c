/**
 * Reference Resolver - id indexes and item traversal for content packages
 */

import type {
  ContentItem,
  ContentOrganization,
  ContentPackageManifest,
  ContentResource
} from './types';

export interface VisitedItem {
  item: ContentItem;
  organization: ContentOrganization;
  /** 0 for top-level items */
  depth: number;
}

/**
 * Walk items in document (pre-order) order with an explicit stack, so that
 * pathological nesting cannot exhaust the call stack.
 */
export function* walkItems(organization: ContentOrganization): Generator<VisitedItem> {
  const stack: Array<{ item: ContentItem; depth: number }> = [];
  for (let i = organization.items.length - 1; i >= 0; i--) {
    stack.push({ item: organization.items[i], depth: 0 });
  }

  let entry = stack.pop();
  while (entry !== undefined) {
    yield { item: entry.item, organization, depth: entry.depth };

    const children = entry.item.children;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ item: children[i], depth: entry.depth + 1 });
    }
    entry = stack.pop();
  }
}

export function organizationsOf(manifest: ContentPackageManifest): ContentOrganization[] {
  return manifest.organizations?.organizations ?? [];
}

export function resourcesOf(manifest: ContentPackageManifest): ContentResource[] {
  return manifest.resources?.resources ?? [];
}

/** Every item of every organization, organizations in order */
export function* walkAllItems(manifest: ContentPackageManifest): Generator<VisitedItem> {
  for (const organization of organizationsOf(manifest)) {
    yield* walkItems(organization);
  }
}

export class ReferenceResolver {
  private readonly organizationIndex = new Map<string, ContentOrganization>();
  private readonly itemIndex = new Map<string, ContentItem>();
  private readonly resourceIndex = new Map<string, ContentResource>();

  constructor(private readonly manifest: ContentPackageManifest) {
    // First declaration wins; duplicates are reported by the uniqueness rules
    for (const organization of organizationsOf(manifest)) {
      if (organization.identifier !== null && !this.organizationIndex.has(organization.identifier)) {
        this.organizationIndex.set(organization.identifier, organization);
      }
    }

    for (const { item } of walkAllItems(manifest)) {
      if (item.identifier !== null && !this.itemIndex.has(item.identifier)) {
        this.itemIndex.set(item.identifier, item);
      }
    }

    for (const resource of resourcesOf(manifest)) {
      if (resource.identifier !== null && !this.resourceIndex.has(resource.identifier)) {
        this.resourceIndex.set(resource.identifier, resource);
      }
    }
  }

  resolveOrganization(identifier: string): ContentOrganization | undefined {
    return this.organizationIndex.get(identifier);
  }

  resolveItem(identifier: string): ContentItem | undefined {
    return this.itemIndex.get(identifier);
  }

  resolveResource(identifier: string): ContentResource | undefined {
    return this.resourceIndex.get(identifier);
  }

  hasOrganization(identifier: string): boolean {
    return this.organizationIndex.has(identifier);
  }

  hasResource(identifier: string): boolean {
    return this.resourceIndex.has(identifier);
  }

  /**
   * Every non-null identifierref across all organizations. Empty strings are
   * included as-is; they never match a resource.
   */
  referencedResourceIds(): Set<string> {
    const referenced = new Set<string>();
    for (const { item } of walkAllItems(this.manifest)) {
      if (item.identifierref !== null) {
        referenced.add(item.identifierref);
      }
    }
    return referenced;
  }

  /** The organization named by organizations/@default, if any */
  defaultOrganization(): ContentOrganization | undefined {
    const ref = this.manifest.organizations?.defaultOrganization;
    if (ref === null || ref === undefined || ref === '') {
      return undefined;
    }
    return this.resolveOrganization(ref);
  }
}
