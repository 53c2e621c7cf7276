import {
  ApiFamily,
  DeclaredAccessControl,
  DeclaredPermissions,
  HttpWriteMethod,
  IDENTIFIER_FIELDS,
  IdentifierField,
  ObjectTypeDefinition,
  ObjectTypeName,
} from '../../types';
import { ClassificationError, FieldError, ValidationError } from '../../utils/errors';

export const ADMINS_GROUP = 'admins';

const defaults = {
  family: 'permissions',
  exemptFromAdminRetention: false,
  pinsAdminsOnWrite: false,
  callerGrantOnWrite: null,
  assignsCreatorOwner: false,
} as const;

export const OBJECT_TYPES = {
  'cluster': {
    ...defaults,
    name: 'cluster',
    pathPrefix: '/clusters',
    serverLabels: ['cluster', 'clusters'],
  },
  'cluster-policy': {
    ...defaults,
    name: 'cluster-policy',
    pathPrefix: '/cluster-policies',
    serverLabels: ['cluster-policy', 'cluster-policies'],
  },
  'instance-pool': {
    ...defaults,
    name: 'instance-pool',
    pathPrefix: '/instance-pools',
    serverLabels: ['instance-pool', 'instance-pools'],
  },
  'job': {
    ...defaults,
    name: 'job',
    pathPrefix: '/jobs',
    serverLabels: ['job', 'jobs'],
    callerGrantOnWrite: 'IS_OWNER',
    assignsCreatorOwner: true,
  },
  'pipeline': {
    ...defaults,
    name: 'pipeline',
    pathPrefix: '/pipelines',
    serverLabels: ['pipeline', 'pipelines'],
    callerGrantOnWrite: 'IS_OWNER',
    assignsCreatorOwner: true,
  },
  'notebook': {
    ...defaults,
    name: 'notebook',
    pathPrefix: '/notebooks',
    serverLabels: ['notebook', 'notebooks'],
  },
  'directory': {
    ...defaults,
    name: 'directory',
    pathPrefix: '/directories',
    serverLabels: ['directory', 'directories'],
  },
  'repo': {
    ...defaults,
    name: 'repo',
    pathPrefix: '/repos',
    serverLabels: ['repo', 'repos'],
  },
  'experiment': {
    ...defaults,
    name: 'experiment',
    pathPrefix: '/experiments',
    serverLabels: ['experiment', 'experiments', 'mlflowexperiment'],
  },
  'registered-model': {
    ...defaults,
    name: 'registered-model',
    pathPrefix: '/registered-models',
    serverLabels: ['registered-model', 'registered-models', 'registeredmodel'],
  },
  'tokens': {
    ...defaults,
    name: 'tokens',
    pathPrefix: '/authorization',
    serverLabels: ['tokens'],
    exemptFromAdminRetention: true,
    pinsAdminsOnWrite: true,
  },
  'passwords': {
    ...defaults,
    name: 'passwords',
    pathPrefix: '/authorization',
    serverLabels: ['passwords'],
    exemptFromAdminRetention: true,
  },
  'sql-endpoint': {
    ...defaults,
    name: 'sql-endpoint',
    pathPrefix: '/sql/endpoints',
    family: 'sql-endpoint',
    serverLabels: ['endpoint', 'endpoints', 'warehouse', 'warehouses', 'sql-endpoint'],
    callerGrantOnWrite: 'CAN_MANAGE',
  },
  'sql-dashboard': {
    ...defaults,
    name: 'sql-dashboard',
    pathPrefix: '/sql/dashboards',
    family: 'sql-asset',
    serverLabels: ['dashboard', 'dashboards', 'sql-dashboard'],
    callerGrantOnWrite: 'CAN_MANAGE',
  },
  'sql-alert': {
    ...defaults,
    name: 'sql-alert',
    pathPrefix: '/sql/alerts',
    family: 'sql-asset',
    serverLabels: ['alert', 'alerts', 'sql-alert'],
    callerGrantOnWrite: 'CAN_MANAGE',
  },
  'sql-query': {
    ...defaults,
    name: 'sql-query',
    pathPrefix: '/sql/queries',
    family: 'sql-asset',
    serverLabels: ['query', 'queries', 'sql-query'],
    callerGrantOnWrite: 'CAN_MANAGE',
  },
} satisfies Record<ObjectTypeName, ObjectTypeDefinition>;

export function getObjectType(name: ObjectTypeName): ObjectTypeDefinition {
  return OBJECT_TYPES[name];
}

/**
 * Write verb per family. Not configurable: the backend accepts only this one.
 */
export function writeMethodFor(family: ApiFamily): HttpWriteMethod {
  switch (family) {
    case 'permissions':
      return 'PUT';
    case 'sql-endpoint':
      return 'PATCH';
    case 'sql-asset':
      return 'POST';
    default: {
      const unhandled: never = family;
      throw new Error(`Unhandled API family: ${String(unhandled)}`);
    }
  }
}

/**
 * Admins hold CAN_MANAGE that cannot be lowered everywhere except on
 * passwords, so the group is hidden from stored state.
 */
export function adminsManagedBySystem(definition: ObjectTypeDefinition): boolean {
  return !definition.exemptFromAdminRetention || definition.pinsAdminsOnWrite;
}

export type IdResolution = 'id' | 'path';

export interface IdentifierMapping {
  field: IdentifierField;
  /** Object type the field declares. Path fields may be re-typed by the lookup. */
  objectType: ObjectTypeName;
  resolution: IdResolution;
}

export const IDENTIFIER_MAPPINGS: Record<IdentifierField, IdentifierMapping> = {
  cluster_id: { field: 'cluster_id', objectType: 'cluster', resolution: 'id' },
  cluster_policy_id: { field: 'cluster_policy_id', objectType: 'cluster-policy', resolution: 'id' },
  instance_pool_id: { field: 'instance_pool_id', objectType: 'instance-pool', resolution: 'id' },
  job_id: { field: 'job_id', objectType: 'job', resolution: 'id' },
  pipeline_id: { field: 'pipeline_id', objectType: 'pipeline', resolution: 'id' },
  notebook_id: { field: 'notebook_id', objectType: 'notebook', resolution: 'id' },
  notebook_path: { field: 'notebook_path', objectType: 'notebook', resolution: 'path' },
  directory_id: { field: 'directory_id', objectType: 'directory', resolution: 'id' },
  directory_path: { field: 'directory_path', objectType: 'directory', resolution: 'path' },
  repo_id: { field: 'repo_id', objectType: 'repo', resolution: 'id' },
  repo_path: { field: 'repo_path', objectType: 'repo', resolution: 'path' },
  experiment_id: { field: 'experiment_id', objectType: 'experiment', resolution: 'id' },
  registered_model_id: { field: 'registered_model_id', objectType: 'registered-model', resolution: 'id' },
  authorization: { field: 'authorization', objectType: 'tokens', resolution: 'id' },
  sql_endpoint_id: { field: 'sql_endpoint_id', objectType: 'sql-endpoint', resolution: 'id' },
  sql_dashboard_id: { field: 'sql_dashboard_id', objectType: 'sql-dashboard', resolution: 'id' },
  sql_alert_id: { field: 'sql_alert_id', objectType: 'sql-alert', resolution: 'id' },
  sql_query_id: { field: 'sql_query_id', objectType: 'sql-query', resolution: 'id' },
};

export interface Classification {
  mapping: IdentifierMapping;
  rawIdentifier: string;
}

/**
 * Pick the single identifier field set in a declared configuration.
 */
export function classify(declared: DeclaredPermissions): Classification {
  const present = IDENTIFIER_FIELDS.filter(field => {
    const value = declared[field];
    return value !== undefined && value !== null && String(value) !== '';
  });

  if (present.length === 0) {
    throw new ValidationError(
      [],
      `At least one type of resource identifiers must be set: ${IDENTIFIER_FIELDS.join(', ')}`,
    );
  }
  if (present.length > 1) {
    throw new ValidationError(present.map(field => ({
      field,
      message: 'Conflicting configuration arguments.',
    })));
  }

  const field = present[0];
  const rawIdentifier = String(declared[field]);

  if (field === 'authorization') {
    if (rawIdentifier !== 'tokens' && rawIdentifier !== 'passwords') {
      throw new ValidationError([{
        field,
        message: `expected "tokens" or "passwords", got "${rawIdentifier}"`,
      }]);
    }
    return {
      mapping: { ...IDENTIFIER_MAPPINGS.authorization, objectType: rawIdentifier },
      rawIdentifier,
    };
  }

  return { mapping: IDENTIFIER_MAPPINGS[field], rawIdentifier };
}

function principalFieldCount(entry: DeclaredAccessControl): number {
  return [entry.user_name, entry.group_name, entry.service_principal_name]
    .filter(name => name !== undefined && name !== '').length;
}

/**
 * Check declared access-control entries. Permission levels are left to the
 * server, which rejects the ones an object type does not take.
 */
export function validateAccessControl(entries: DeclaredAccessControl[] | undefined): DeclaredAccessControl[] {
  if (!entries || entries.length === 0) {
    throw new ValidationError([{ field: 'access_control', message: 'Missing required argument' }]);
  }

  const errors: FieldError[] = [];
  entries.forEach((entry, index) => {
    if (entry.group_name === ADMINS_GROUP) {
      errors.push({
        field: 'access_control',
        message: 'It is not possible to restrict any permissions from `admins`.',
      });
      return;
    }
    const principals = principalFieldCount(entry);
    if (principals !== 1) {
      errors.push({
        field: `access_control.${index}`,
        message: principals === 0
          ? 'one of user_name, group_name or service_principal_name must be set'
          : 'only one of user_name, group_name or service_principal_name may be set',
      });
    }
    if (!entry.permission_level) {
      errors.push({ field: `access_control.${index}.permission_level`, message: 'Missing required argument' });
    }
  });

  if (errors.length > 0) {
    throw new ValidationError(errors);
  }
  return entries;
}

/**
 * Full pre-write validation of a declared configuration.
 */
export function validateDeclaredConfig(declared: DeclaredPermissions): Classification {
  const classification = classify(declared);
  validateAccessControl(declared.access_control);
  return classification;
}

/**
 * Map a server-reported `object_type` onto the registry.
 */
export function classifyServerType(label: string | undefined): ObjectTypeName {
  const normalized = (label || '').toLowerCase();
  const match = Object.values(OBJECT_TYPES).find(definition => definition.serverLabels.includes(normalized));
  if (!match) {
    throw new ClassificationError(label || '');
  }
  return match.name;
}

/**
 * Infer the object type from a canonical path such as `/jobs/9`.
 */
export function objectTypeForPath(objectPath: string): ObjectTypeName {
  if (objectPath === '/authorization/tokens') return 'tokens';
  if (objectPath === '/authorization/passwords') return 'passwords';

  const match = Object.values(OBJECT_TYPES)
    .filter(definition => definition.pathPrefix !== '/authorization')
    .find(definition => objectPath.startsWith(`${definition.pathPrefix}/`));
  if (!match) {
    throw new ClassificationError(objectPath);
  }
  return match.name;
}
