import { ObjectStatus, ObjectTypeName } from '../../types';
import { CancelledError, ResolutionError, errorMessage, throwIfAborted } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { PathLookup } from '../workspace.service';
import { IdentifierMapping, getObjectType } from './ObjectTypeRegistry';

export interface ResolvedObject {
  objectType: ObjectTypeName;
  /** Canonical path, e.g. `/notebooks/988765` */
  objectPath: string;
}

const WORKSPACE_OBJECT_TYPES: Partial<Record<string, ObjectTypeName>> = {
  notebook: 'notebook',
  directory: 'directory',
  repo: 'repo',
};

export function canonicalPath(objectType: ObjectTypeName, identifier: string): string {
  const definition = getObjectType(objectType);
  // tokens and passwords share the /authorization prefix and have no id of their own
  if (definition.pathPrefix === '/authorization') {
    return `/authorization/${objectType}`;
  }
  return `${definition.pathPrefix}/${identifier}`;
}

export class PathResolver {
  private pathLookup: PathLookup;

  constructor(pathLookup: PathLookup) {
    this.pathLookup = pathLookup;
  }

  /**
   * Turn a declared identifier into the object path the permissions API uses.
   * Workspace paths cost one lookup, whose reported object type decides the
   * endpoint family.
   */
  async resolve(mapping: IdentifierMapping, rawIdentifier: string, signal?: AbortSignal): Promise<ResolvedObject> {
    if (mapping.resolution === 'id') {
      return {
        objectType: mapping.objectType,
        objectPath: canonicalPath(mapping.objectType, rawIdentifier),
      };
    }

    throwIfAborted(signal, `resolving ${rawIdentifier}`);
    let status: ObjectStatus;
    try {
      status = await this.pathLookup.getStatus(rawIdentifier, signal);
    } catch (error) {
      if (error instanceof CancelledError) {
        throw error;
      }
      throw new ResolutionError(`Cannot load path ${rawIdentifier}: ${errorMessage(error)}`, rawIdentifier, error);
    }

    const objectType = WORKSPACE_OBJECT_TYPES[(status.object_type || '').toLowerCase()];
    if (!objectType) {
      throw new ResolutionError(
        `Cannot set permissions on ${rawIdentifier}: ${status.object_type} objects have no access control`,
        rawIdentifier,
      );
    }
    if (objectType !== mapping.objectType) {
      logger.info(`${mapping.field} ${rawIdentifier} resolved to a ${objectType}`, { objectType });
    }

    return {
      objectType,
      objectPath: canonicalPath(objectType, String(status.object_id)),
    };
  }
}
