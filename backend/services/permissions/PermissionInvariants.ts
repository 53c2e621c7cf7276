import { AccessControlChange, AccessControlChangeList, ObjectACL, ObjectTypeName, PermissionsEntity } from '../../types';
import { throwIfAborted } from '../../utils/errors';
import { CreatorLookup } from '../creator.service';
import { dedupeChanges, isPrincipal, principalOf, toAccessControlChange } from './AclMapper';
import { ADMINS_GROUP, adminsManagedBySystem, getObjectType } from './ObjectTypeRegistry';

const ADMINS_MANAGE: AccessControlChange = {
  principal: { kind: 'group', name: ADMINS_GROUP },
  permissionLevel: 'CAN_MANAGE',
};

function isAdmins(change: AccessControlChange): boolean {
  return isPrincipal(change.principal, 'group', ADMINS_GROUP);
}

/**
 * True when the server reports a direct (non-inherited) grant for admins.
 */
function observedDirectAdmins(observed: ObjectACL | undefined): boolean {
  return (observed?.access_control_list ?? []).some(ac => {
    const principal = principalOf(ac);
    return principal !== null
      && isPrincipal(principal, 'group', ADMINS_GROUP)
      && toAccessControlChange(ac) !== null;
  });
}

/**
 * Final write payload for create and update: the desired list plus whatever
 * the object type needs so that neither the caller nor admins are locked out.
 */
export function augment(
  objectType: ObjectTypeName,
  desired: AccessControlChangeList,
  caller: string,
  observed?: ObjectACL,
): AccessControlChangeList {
  const definition = getObjectType(objectType);

  const result = dedupeChanges(desired).map(change =>
    isAdmins(change) && !definition.exemptFromAdminRetention
      ? { ...change, permissionLevel: ADMINS_MANAGE.permissionLevel }
      : change);

  switch (definition.callerGrantOnWrite) {
    case 'IS_OWNER':
      if (!result.some(change => change.permissionLevel === 'IS_OWNER')) {
        // one entry per principal: a declared caller entry is raised to owner
        const index = result.findIndex(change => isPrincipal(change.principal, 'user', caller));
        if (index >= 0) {
          result[index] = { ...result[index], permissionLevel: 'IS_OWNER' };
        } else {
          result.push({ principal: { kind: 'user', name: caller }, permissionLevel: 'IS_OWNER' });
        }
      }
      break;
    case 'CAN_MANAGE':
      if (!result.some(change => isPrincipal(change.principal, 'user', caller))) {
        result.push({ principal: { kind: 'user', name: caller }, permissionLevel: 'CAN_MANAGE' });
      }
      break;
    case null:
      break;
    default: {
      const unhandled: never = definition.callerGrantOnWrite;
      throw new Error(`Unhandled caller grant: ${String(unhandled)}`);
    }
  }

  const hasAdmins = result.some(isAdmins);
  if (!hasAdmins && !definition.exemptFromAdminRetention && observedDirectAdmins(observed)) {
    result.push(ADMINS_MANAGE);
  } else if (!hasAdmins && definition.pinsAdminsOnWrite) {
    result.push(ADMINS_MANAGE);
  }

  return result;
}

/**
 * Payload that replaces managed permissions when they are removed. Admins
 * keep CAN_MANAGE and creator-bearing objects get their creator back as
 * owner, so the object never ends up with an empty ACL.
 */
export async function resetPayload(
  objectType: ObjectTypeName,
  objectPath: string,
  observed: ObjectACL,
  creatorLookup: CreatorLookup,
  signal?: AbortSignal,
): Promise<AccessControlChangeList> {
  const definition = getObjectType(objectType);
  const result: AccessControlChangeList = [];

  if ((!definition.exemptFromAdminRetention && observedDirectAdmins(observed)) || definition.pinsAdminsOnWrite) {
    result.push(ADMINS_MANAGE);
  }

  if (definition.assignsCreatorOwner) {
    throwIfAborted(signal, `looking up the creator of ${objectPath}`);
    const objectId = objectPath.substring(objectPath.lastIndexOf('/') + 1);
    const creator = await creatorLookup.getCreator(objectType, objectId, signal);
    result.push({ principal: { kind: 'user', name: creator }, permissionLevel: 'IS_OWNER' });
  }

  return result;
}

/**
 * Stored representation: admins are implicit wherever the system manages them.
 */
export function elideManaged(entity: PermissionsEntity): PermissionsEntity {
  if (!adminsManagedBySystem(getObjectType(entity.objectType))) {
    return entity;
  }
  return {
    ...entity,
    accessControlList: entity.accessControlList.filter(change => !isAdmins(change)),
  };
}
