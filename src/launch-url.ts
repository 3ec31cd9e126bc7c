/**
 * Launch URL resolution per manifest kind
 */

import { walkAllItems, resourcesOf, ReferenceResolver } from './reference-resolver';
import type {
  AiccManifest,
  Cmi5AssignableUnit,
  Cmi5Block,
  Cmi5Manifest,
  ContentPackageManifest,
  XapiManifest
} from './types';

function present(value: string | null): value is string {
  return value !== null && value.trim() !== '';
}

/**
 * The href of the first resource reached from the default organization (or
 * the first organization), falling back to the first resource with an href.
 */
export function contentPackageLaunchUrl(manifest: ContentPackageManifest): string | null {
  const resolver = new ReferenceResolver(manifest);
  const preferred = resolver.defaultOrganization()?.identifier ?? null;

  let fallback: string | null = null;
  for (const { item, organization } of walkAllItems(manifest)) {
    if (item.identifierref === null) {
      continue;
    }
    const href = resolver.resolveResource(item.identifierref)?.href ?? null;
    if (!present(href)) {
      continue;
    }
    if (preferred === null || organization.identifier === preferred) {
      return href;
    }
    fallback = fallback ?? href;
  }

  if (fallback !== null) {
    return fallback;
  }

  const first = resourcesOf(manifest).find(resource => present(resource.href));
  return first?.href ?? null;
}

/**
 * First member of the course structure block named ROOT (any case), or of
 * the first block when none is. Null without a course structure.
 */
export function aiccRootUnitId(manifest: AiccManifest): string | null {
  const structure = manifest.courseStructure;
  const root = structure.find(block => block.block.toLowerCase() === 'root') ?? structure[0];
  const member = root?.members[0];
  return member !== undefined && present(member) ? member : null;
}

/**
 * The root assignable unit's file name. Without a course structure, the
 * first unit with a file name launches.
 */
export function aiccLaunchUrl(manifest: AiccManifest): string | null {
  if (manifest.courseStructure.length === 0) {
    const first = manifest.assignableUnits.find(au => present(au.fileName));
    return first?.fileName ?? null;
  }

  const rootId = aiccRootUnitId(manifest);
  const root = manifest.assignableUnits.find(au => au.systemId === rootId);
  return root !== undefined && present(root.fileName) ? root.fileName : null;
}

/**
 * Every AU, approximating document order: the manifest does not record how
 * AUs and blocks interleave, so top-level AUs come first, then each block
 * depth-first with its own AUs ahead of its nested blocks. A course.xml that
 * puts a block before a top-level AU launches differently here than in an
 * LMS that walks the XML.
 */
export function cmi5AssignableUnits(manifest: Cmi5Manifest): Cmi5AssignableUnit[] {
  const units: Cmi5AssignableUnit[] = [...manifest.assignableUnits];
  const stack: Cmi5Block[] = [...manifest.blocks].reverse();

  let block = stack.pop();
  while (block !== undefined) {
    units.push(...block.assignableUnits);
    for (let i = block.blocks.length - 1; i >= 0; i--) {
      stack.push(block.blocks[i]);
    }
    block = stack.pop();
  }

  return units;
}

export function cmi5LaunchUrl(manifest: Cmi5Manifest): string | null {
  const unit = cmi5AssignableUnits(manifest).find(au => present(au.url));
  return unit?.url ?? null;
}

export function xapiLaunchUrl(manifest: XapiManifest): string | null {
  const activity = manifest.activities.find(entry => present(entry.launch));
  return activity?.launch ?? null;
}
