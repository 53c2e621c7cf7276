export type ObjectTypeName =
  | 'cluster'
  | 'cluster-policy'
  | 'instance-pool'
  | 'job'
  | 'pipeline'
  | 'notebook'
  | 'directory'
  | 'repo'
  | 'experiment'
  | 'registered-model'
  | 'tokens'
  | 'passwords'
  | 'sql-endpoint'
  | 'sql-dashboard'
  | 'sql-alert'
  | 'sql-query';

/**
 * Endpoint family. The permissions API is not uniform: SQL endpoints take
 * PATCH, SQL assets live under a preview path and take POST.
 */
export type ApiFamily = 'permissions' | 'sql-endpoint' | 'sql-asset';

export type HttpWriteMethod = 'PUT' | 'PATCH' | 'POST';

export interface ObjectTypeDefinition {
  name: ObjectTypeName;
  /** Canonical path prefix, e.g. `/clusters` or `/sql/dashboards` */
  pathPrefix: string;
  family: ApiFamily;
  /** Labels the server reports in `object_type`, lower-cased */
  serverLabels: readonly string[];
  exemptFromAdminRetention: boolean;
  pinsAdminsOnWrite: boolean;
  callerGrantOnWrite: 'IS_OWNER' | 'CAN_MANAGE' | null;
  assignsCreatorOwner: boolean;
}

export type PrincipalKind = 'user' | 'group' | 'service-principal';

export interface Principal {
  kind: PrincipalKind;
  name: string;
}

export interface AccessControlChange {
  principal: Principal;
  permissionLevel: string;
}

export type AccessControlChangeList = AccessControlChange[];

// Wire shapes

export interface PrincipalFields {
  user_name?: string;
  group_name?: string;
  service_principal_name?: string;
}

export interface AccessControlChangeWire extends PrincipalFields {
  permission_level: string;
}

export interface AccessControlChangeListWire {
  access_control_list: AccessControlChangeWire[];
}

export interface Permission {
  permission_level: string;
  inherited?: boolean;
  inherited_from_object?: string[];
}

/**
 * One principal's observed grants. Nested objects carry `all_permissions`,
 * the SQL asset family reports a flat `permission_level`.
 */
export interface AccessControl extends PrincipalFields {
  all_permissions?: Permission[];
  permission_level?: string;
}

export interface ObjectACL {
  object_id?: string;
  object_type?: string;
  access_control_list?: AccessControl[];
}

export interface PermissionsEntity {
  objectType: ObjectTypeName;
  accessControlList: AccessControlChangeList;
}

// Declared configuration

export interface DeclaredAccessControl extends PrincipalFields {
  permission_level?: string;
}

export const IDENTIFIER_FIELDS = [
  'cluster_id',
  'cluster_policy_id',
  'instance_pool_id',
  'job_id',
  'pipeline_id',
  'notebook_id',
  'notebook_path',
  'directory_id',
  'directory_path',
  'repo_id',
  'repo_path',
  'experiment_id',
  'registered_model_id',
  'authorization',
  'sql_endpoint_id',
  'sql_dashboard_id',
  'sql_alert_id',
  'sql_query_id',
] as const;

export type IdentifierField = typeof IDENTIFIER_FIELDS[number];

export type DeclaredPermissions = {
  [field in IdentifierField]?: string | number;
} & {
  access_control?: DeclaredAccessControl[];
};

// Collaborator payloads

export interface ObjectStatus {
  /** int64; a string once it no longer fits a double */
  object_id: string | number;
  object_type: string;
  path?: string;
}

export interface ScimUser {
  userName: string;
  id?: string;
}
