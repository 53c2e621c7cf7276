import { DeclaredAccessControl, DeclaredPermissions, ObjectTypeName, PermissionsEntity } from '../types';
import { DatabricksClient } from '../utils/databricksClient';
import { isNotFound, throwIfAborted } from '../utils/errors';
import { logger } from '../utils/logger';
import { CreatorLookup, CreatorService } from './creator.service';
import { IdentityLookup, IdentityService } from './identity.service';
import { formatChange, fromDeclared, diff, toEntity } from './permissions/AclMapper';
import { validateAccessControl, validateDeclaredConfig } from './permissions/ObjectTypeRegistry';
import { PathResolver } from './permissions/PathResolver';
import { augment, elideManaged } from './permissions/PermissionInvariants';
import { PermissionsApi } from './permissions/PermissionsApi';
import { PathLookup, WorkspaceService } from './workspace.service';

export interface PermissionsCollaborators {
  identity: IdentityLookup;
  pathLookup: PathLookup;
  creatorLookup: CreatorLookup;
}

/**
 * Reconciles declared access-control lists with what the workspace reports.
 * Each call is one sequential pass: identity, optional path lookup, optional
 * creator lookup, one ACL read, one ACL write.
 */
export class PermissionsService {
  private api: PermissionsApi;
  private identity: IdentityLookup;
  private pathResolver: PathResolver;
  private creatorLookup: CreatorLookup;

  constructor(client: DatabricksClient, collaborators: Partial<PermissionsCollaborators> = {}) {
    this.api = new PermissionsApi(client);
    this.identity = collaborators.identity ?? new IdentityService(client);
    this.pathResolver = new PathResolver(collaborators.pathLookup ?? new WorkspaceService(client));
    this.creatorLookup = collaborators.creatorLookup ?? new CreatorService(client);
  }

  private async caller(signal?: AbortSignal): Promise<string> {
    throwIfAborted(signal, 'resolving the caller identity');
    const user = await this.identity.me(signal);
    return user.userName;
  }

  /**
   * Current managed permissions, or null when the object no longer exists.
   */
  async read(objectType: ObjectTypeName, objectPath: string, signal?: AbortSignal): Promise<PermissionsEntity | null> {
    const caller = await this.caller(signal);

    try {
      const acl = await this.api.get(objectType, objectPath, signal);
      return elideManaged(toEntity(acl, caller));
    } catch (error) {
      if (isNotFound(error)) {
        logger.warn(`Permissions of ${objectPath} not found, treating as removed`, { objectType, objectPath });
        return null;
      }
      throw error;
    }
  }

  /**
   * Apply a declared configuration to a new object. Returns the canonical
   * object path later calls are keyed on.
   */
  async create(declared: DeclaredPermissions, signal?: AbortSignal): Promise<string> {
    const { mapping, rawIdentifier } = validateDeclaredConfig(declared);
    const caller = await this.caller(signal);
    const { objectType, objectPath } = await this.pathResolver.resolve(mapping, rawIdentifier, signal);

    const changes = augment(objectType, fromDeclared(declared.access_control ?? []), caller);
    await this.api.set(objectType, objectPath, changes, signal);

    logger.info(`Created permissions for ${objectPath}`, { objectType, objectPath });
    return objectPath;
  }

  async update(
    objectType: ObjectTypeName,
    objectPath: string,
    desired: DeclaredAccessControl[],
    signal?: AbortSignal,
  ): Promise<void> {
    validateAccessControl(desired);
    const caller = await this.caller(signal);
    const observed = await this.api.get(objectType, objectPath, signal);

    const changes = augment(objectType, fromDeclared(desired), caller, observed);
    const { toGrant, toRevoke } = diff(changes, elideManaged(toEntity(observed, caller)).accessControlList);
    logger.debug(`Reconciling permissions of ${objectPath}`, {
      objectType,
      objectPath,
      grant: toGrant.map(formatChange),
      revoke: toRevoke.map(formatChange),
    });

    await this.api.set(objectType, objectPath, changes, signal);
  }

  /**
   * Remove managed permissions. A missing object counts as already removed.
   */
  async delete(objectType: ObjectTypeName, objectPath: string, signal?: AbortSignal): Promise<void> {
    const removed = await this.api.delete(objectType, objectPath, this.creatorLookup, signal);
    if (removed) {
      logger.info(`Removed managed permissions of ${objectPath}`, { objectType, objectPath });
    }
  }
}
