import {
  AccessControl,
  AccessControlChange,
  AccessControlChangeList,
  AccessControlChangeListWire,
  AccessControlChangeWire,
  DeclaredAccessControl,
  ObjectACL,
  PermissionsEntity,
  Principal,
  PrincipalFields,
} from '../../types';
import { classifyServerType } from './ObjectTypeRegistry';

export function principalKey(principal: Principal): string {
  return `${principal.kind}:${principal.name}`;
}

export function principalOf(fields: PrincipalFields): Principal | null {
  if (fields.user_name) return { kind: 'user', name: fields.user_name };
  if (fields.group_name) return { kind: 'group', name: fields.group_name };
  if (fields.service_principal_name) return { kind: 'service-principal', name: fields.service_principal_name };
  return null;
}

export function principalFields(principal: Principal): PrincipalFields {
  switch (principal.kind) {
    case 'user':
      return { user_name: principal.name };
    case 'group':
      return { group_name: principal.name };
    case 'service-principal':
      return { service_principal_name: principal.name };
    default: {
      const unhandled: never = principal.kind;
      throw new Error(`Unhandled principal kind: ${String(unhandled)}`);
    }
  }
}

export function isPrincipal(principal: Principal, kind: Principal['kind'], name: string): boolean {
  return principal.kind === kind && principal.name === name;
}

export function formatChange(change: AccessControlChange): string {
  return `${change.principal.name} ${change.permissionLevel}`;
}

/**
 * Render an observed entry, e.g. `me[CAN_READ (from [parent]) CAN_MANAGE]`
 */
export function formatAccessControl(ac: AccessControl): string {
  const name = principalOf(ac)?.name ?? '';
  if (!ac.all_permissions) {
    return `${name}[${ac.permission_level ?? ''}]`;
  }
  const grants = ac.all_permissions.map(permission => {
    const from = permission.inherited_from_object;
    return from && from.length > 0
      ? `${permission.permission_level} (from [${from.join(' ')}])`
      : permission.permission_level;
  });
  return `${name}[${grants.join(' ')}]`;
}

/**
 * The level the principal holds directly. When several direct grants exist
 * the first one reported wins; flat (SQL) entries carry the level themselves.
 * Returns null for inherited-only entries and for the empty sentinel.
 */
export function toAccessControlChange(ac: AccessControl): AccessControlChange | null {
  const principal = principalOf(ac);
  if (!principal) {
    return null;
  }

  const direct = ac.all_permissions?.find(permission => !permission.inherited && permission.permission_level);
  if (direct) {
    return { principal, permissionLevel: direct.permission_level };
  }
  if (ac.permission_level) {
    return { principal, permissionLevel: ac.permission_level };
  }
  return null;
}

/**
 * Changes for declared entries; entries without a principal or level are skipped.
 */
export function fromDeclared(entries: DeclaredAccessControl[]): AccessControlChangeList {
  const changes: AccessControlChangeList = [];
  for (const entry of entries) {
    const principal = principalOf(entry);
    if (principal && entry.permission_level) {
      changes.push({ principal, permissionLevel: entry.permission_level });
    }
  }
  return changes;
}

/**
 * One entry per principal, first occurrence kept.
 */
export function dedupeChanges(changes: AccessControlChangeList): AccessControlChangeList {
  const seen = new Set<string>();
  return changes.filter(change => {
    const key = principalKey(change.principal);
    if (seen.has(key)) {
      return false;
    }
    seen.add(key);
    return true;
  });
}

/**
 * Comparable form of a server ACL. The caller's own user entry and
 * inherited-only grants are left out.
 */
export function toEntity(acl: ObjectACL, caller: string): PermissionsEntity {
  const objectType = classifyServerType(acl.object_type);

  const changes: AccessControlChangeList = [];
  for (const ac of acl.access_control_list ?? []) {
    if (ac.user_name !== undefined && ac.user_name === caller) {
      continue;
    }
    const change = toAccessControlChange(ac);
    if (change) {
      changes.push(change);
    }
  }

  return { objectType, accessControlList: dedupeChanges(changes) };
}

export function toWireChange(change: AccessControlChange): AccessControlChangeWire {
  return { ...principalFields(change.principal), permission_level: change.permissionLevel };
}

/**
 * Request payload for a permissions write.
 */
export function toChangeList(changes: AccessControlChangeList): AccessControlChangeListWire {
  return {
    access_control_list: changes
      .filter(change => change.principal.name !== '' && change.permissionLevel !== '')
      .map(toWireChange),
  };
}

/**
 * Reverse of `toEntity`: every entry becomes a single direct grant.
 */
export function toObjectACL(entity: PermissionsEntity, objectPath: string, objectTypeLabel: string): ObjectACL {
  return {
    object_id: objectPath,
    object_type: objectTypeLabel,
    access_control_list: entity.accessControlList.map(change => ({
      ...principalFields(change.principal),
      all_permissions: [{ permission_level: change.permissionLevel, inherited: false }],
    })),
  };
}

export interface AclDiff {
  toGrant: AccessControlChangeList;
  toRevoke: AccessControlChangeList;
}

/**
 * Order-independent comparison keyed on principal. A changed level shows up
 * as a grant of the new level and a revocation of the old one.
 */
export function diff(desired: AccessControlChangeList, observed: AccessControlChangeList): AclDiff {
  const byKey = (changes: AccessControlChangeList) =>
    new Map(changes.map((change): [string, AccessControlChange] => [principalKey(change.principal), change]));
  const observedByKey = byKey(observed);
  const desiredByKey = byKey(desired);

  const toGrant = desired.filter(change =>
    observedByKey.get(principalKey(change.principal))?.permissionLevel !== change.permissionLevel);
  const toRevoke = observed.filter(change =>
    desiredByKey.get(principalKey(change.principal))?.permissionLevel !== change.permissionLevel);

  return { toGrant, toRevoke };
}
