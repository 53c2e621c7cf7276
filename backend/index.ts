export { PermissionsService } from './services/permissions.service';
export type { PermissionsCollaborators } from './services/permissions.service';
export { IdentityService } from './services/identity.service';
export type { IdentityLookup } from './services/identity.service';
export { WorkspaceService } from './services/workspace.service';
export type { PathLookup } from './services/workspace.service';
export { CreatorService } from './services/creator.service';
export type { CreatorLookup } from './services/creator.service';
export {
  OBJECT_TYPES,
  classify,
  classifyServerType,
  objectTypeForPath,
  validateDeclaredConfig,
} from './services/permissions/ObjectTypeRegistry';
export { PathResolver, canonicalPath } from './services/permissions/PathResolver';
export { augment, elideManaged, resetPayload } from './services/permissions/PermissionInvariants';
export { diff, toAccessControlChange, toChangeList, toEntity, toObjectACL } from './services/permissions/AclMapper';
export { PermissionsApi, permissionsEndpoint } from './services/permissions/PermissionsApi';
export { createDatabricksClient } from './utils/databricksClient';
export type { DatabricksClient, RequestOptions } from './utils/databricksClient';
export { getDatabricksConfig } from './utils/databricksConfig';
export type { DatabricksConfig } from './utils/databricksConfig';
export { createApp } from './app';
export * from './utils/errors';
export * from './types';
