import { AccessControlChangeList, ObjectACL, ObjectTypeName } from '../../types';
import { DatabricksClient } from '../../utils/databricksClient';
import { isNotFound, throwIfAborted } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { CreatorLookup } from '../creator.service';
import { formatChange, toChangeList } from './AclMapper';
import { getObjectType, writeMethodFor } from './ObjectTypeRegistry';
import { resetPayload } from './PermissionInvariants';

/**
 * Endpoint for an object's ACL. SQL assets (`/sql/dashboards/abc`) live under
 * `/preview/sql/permissions/dashboards/abc`; everything else under `/permissions`.
 */
export function permissionsEndpoint(objectType: ObjectTypeName, objectPath: string): string {
  const { family } = getObjectType(objectType);
  switch (family) {
    case 'permissions':
    case 'sql-endpoint':
      return `/permissions${objectPath}`;
    case 'sql-asset':
      return `/preview/sql/permissions${objectPath.replace(/^\/sql/, '')}`;
    default: {
      const unhandled: never = family;
      throw new Error(`Unhandled API family: ${String(unhandled)}`);
    }
  }
}

export class PermissionsApi {
  private client: DatabricksClient;

  constructor(client: DatabricksClient) {
    this.client = client;
  }

  async get(objectType: ObjectTypeName, objectPath: string, signal?: AbortSignal): Promise<ObjectACL> {
    throwIfAborted(signal, `reading permissions of ${objectPath}`);
    return this.client.get<ObjectACL>(permissionsEndpoint(objectType, objectPath), { signal });
  }

  async set(
    objectType: ObjectTypeName,
    objectPath: string,
    changes: AccessControlChangeList,
    signal?: AbortSignal,
  ): Promise<void> {
    throwIfAborted(signal, `writing permissions of ${objectPath}`);
    const endpoint = permissionsEndpoint(objectType, objectPath);
    const body = toChangeList(changes);
    const method = writeMethodFor(getObjectType(objectType).family);

    logger.info(`Setting permissions on ${objectPath}`, {
      objectType,
      objectPath,
      method,
      changes: changes.map(formatChange),
    });

    switch (method) {
      case 'PUT':
        await this.client.put<unknown>(endpoint, body, { signal });
        break;
      case 'PATCH':
        await this.client.patch<unknown>(endpoint, body, { signal });
        break;
      case 'POST':
        await this.client.post<unknown>(endpoint, body, { signal });
        break;
      default: {
        const unhandled: never = method;
        throw new Error(`Unhandled write method: ${String(unhandled)}`);
      }
    }
  }

  /**
   * Drop managed permissions. Returns false when the object is already gone.
   */
  async delete(
    objectType: ObjectTypeName,
    objectPath: string,
    creatorLookup: CreatorLookup,
    signal?: AbortSignal,
  ): Promise<boolean> {
    let observed: ObjectACL;
    try {
      observed = await this.get(objectType, objectPath, signal);
    } catch (error) {
      if (isNotFound(error)) {
        logger.info(`Permissions of ${objectPath} already removed`, { objectType, objectPath });
        return false;
      }
      throw error;
    }

    const payload = await resetPayload(objectType, objectPath, observed, creatorLookup, signal);
    await this.set(objectType, objectPath, payload, signal);
    return true;
  }
}
