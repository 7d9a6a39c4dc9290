import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { AuthenticationChange, SecurityChange } from '../types.js';
import { jsonResult, toolError, toolOperation, withSession, type ToolContext } from '../utils.js';

export const GLOBAL_PERMISSIONS = [
  'AUTHENTICATE',
  'VIEW_SESSION',
  'MODIFY_SESSION',
  'REGISTER_HANDLER',
  'VIEW_SERVER',
  'CONTROL_SERVER',
  'VIEW_SECURITY',
  'MODIFY_SECURITY',
  'READ_TOPIC_VIEWS',
  'MODIFY_TOPIC_VIEWS',
] as const;

export const PATH_PERMISSIONS = [
  'READ_TOPIC',
  'UPDATE_TOPIC',
  'MODIFY_TOPIC',
  'SEND_TO_MESSAGE_HANDLER',
  'SEND_TO_SESSION',
  'SELECT_TOPIC',
  'QUERY_OBSOLETE_TIME_SERIES_EVENTS',
  'EDIT_TIME_SERIES_EVENTS',
  'EDIT_OWN_TIME_SERIES_EVENTS',
  'EXPOSE_BRANCH',
  'ACQUIRE_LOCK',
] as const;

export const ANONYMOUS_CONNECTION_ACTIONS = ['allow', 'deny', 'abstain'] as const;

const MODIFY_SECURITY = 'Needs MODIFY_SECURITY permission.';
const MODIFY_AUTHENTICATION = 'Needs CONTROL_SERVER permission.';

export const securityTools = {
  get_security: {
    description:
      'Returns the security configuration of the server: roles, their permissions and the roles assigned to ' +
      "anonymous and named sessions. Needs VIEW_SECURITY permission. See the 'security' context.",
  },
  get_system_authentication: {
    description:
      'Returns the system authentication configuration: principals, their roles and the anonymous connection policy. ' +
      'Needs VIEW_SECURITY permission.',
  },
  set_roles_for_anonymous_sessions: {
    description: `Replaces the roles assigned to anonymous sessions. ${MODIFY_SECURITY}`,
  },
  set_roles_for_named_sessions: {
    description: `Replaces the roles assigned to named (authenticated) sessions. ${MODIFY_SECURITY}`,
  },
  set_role_global_permissions: {
    description:
      'Replaces the global permissions of a role, such as VIEW_SECURITY or REGISTER_HANDLER. ' +
      `${MODIFY_SECURITY} See the 'security' context.`,
  },
  set_role_default_path_permissions: {
    description: `Replaces the path permissions a role has for paths without specific permissions. ${MODIFY_SECURITY}`,
  },
  set_role_path_permissions: {
    description: `Replaces the permissions a role has for a path and the paths below it. ${MODIFY_SECURITY}`,
  },
  remove_role_path_permissions: {
    description: `Removes the permissions a role has for a path, so the path inherits them again. ${MODIFY_SECURITY}`,
  },
  set_role_includes: {
    description: `Replaces the roles a role includes; a role has the permissions of the roles it includes. ${MODIFY_SECURITY}`,
  },
  lock_role_to_principal: {
    description: `Locks a role so that only the named principal can change it. ${MODIFY_SECURITY}`,
  },
  isolate_path: {
    description: `Isolates a path so it no longer inherits permissions from the paths above it. ${MODIFY_SECURITY}`,
  },
  deisolate_path: {
    description: `Lets an isolated path inherit permissions from the paths above it again. ${MODIFY_SECURITY}`,
  },
  add_principal: {
    description:
      'Adds a principal to the system authentication store with a password and roles, optionally locked so only ' +
      `the locking principal can change it. ${MODIFY_AUTHENTICATION}`,
  },
  assign_principal_roles: {
    description: `Replaces the roles assigned to a principal. ${MODIFY_AUTHENTICATION}`,
  },
  set_principal_password: {
    description: `Changes the password of a principal. ${MODIFY_AUTHENTICATION}`,
  },
  remove_principal: {
    description: `Removes a principal from the system authentication store. ${MODIFY_AUTHENTICATION}`,
  },
  set_anonymous_connection_policy: {
    description:
      "Decides whether anonymous connections are allowed (with roles), denied, or left to other authenticators ('abstain'). " +
      MODIFY_AUTHENTICATION,
  },
  trust_client_proposed_property: {
    description:
      'Accepts a session property proposed by clients when connecting, if its value is one of the allowed values. ' +
      MODIFY_AUTHENTICATION,
  },
  ignore_client_proposed_property: {
    description: `Stops accepting a session property proposed by clients. ${MODIFY_AUTHENTICATION}`,
  },
};

/** Trimmed, de-duplicated and sorted role names. */
export function normalizeRoles(roles: string[]): string[] {
  return [...new Set(roles.map((role) => role.trim()).filter((role) => role.length > 0))].sort();
}

export async function handleGetSecurity(ctx: ToolContext, callerId: string): Promise<CallToolResult> {
  return withSession(ctx, callerId, 'get_security', async (session) => {
    return jsonResult(await session.securityApi().getSecurityConfiguration());
  });
}

export async function handleGetSystemAuthentication(ctx: ToolContext, callerId: string): Promise<CallToolResult> {
  return withSession(ctx, callerId, 'get_system_authentication', async (session) => {
    return jsonResult(await session.securityApi().getSystemAuthenticationConfiguration());
  });
}

function updateSecurity(
  ctx: ToolContext,
  callerId: string,
  operation: string,
  change: SecurityChange,
  payload: Record<string, unknown>
): Promise<CallToolResult> {
  return withSession(ctx, callerId, operation, async (session) => {
    await session.securityApi().updateSecurity(change);
    ctx.logger.info('security_store_updated', { operation, change: change.kind });
    return jsonResult(payload);
  });
}

function updateAuthentication(
  ctx: ToolContext,
  callerId: string,
  operation: string,
  change: AuthenticationChange,
  payload: Record<string, unknown>
): Promise<CallToolResult> {
  return withSession(ctx, callerId, operation, async (session) => {
    await session.securityApi().updateAuthentication(change);
    ctx.logger.info('authentication_store_updated', { operation, change: change.kind });
    return jsonResult(payload);
  });
}

export async function handleSetRolesForAnonymousSessions(
  ctx: ToolContext,
  callerId: string,
  args: { roles: string[] }
): Promise<CallToolResult> {
  const roles = normalizeRoles(args.roles);
  return updateSecurity(
    ctx,
    callerId,
    toolOperation('set_roles_for_anonymous_sessions', ...roles),
    { kind: 'rolesForAnonymousSessions', roles },
    { sessionType: 'anonymous', roles, updated: true }
  );
}

export async function handleSetRolesForNamedSessions(
  ctx: ToolContext,
  callerId: string,
  args: { roles: string[] }
): Promise<CallToolResult> {
  const roles = normalizeRoles(args.roles);
  return updateSecurity(
    ctx,
    callerId,
    toolOperation('set_roles_for_named_sessions', ...roles),
    { kind: 'rolesForNamedSessions', roles },
    { sessionType: 'named', roles, updated: true }
  );
}

function uniquePermissions(permissions: readonly string[]): string[] {
  return [...new Set(permissions)].sort();
}

export async function handleSetRoleGlobalPermissions(
  ctx: ToolContext,
  callerId: string,
  args: { roleName: string; permissions: (typeof GLOBAL_PERMISSIONS)[number][] }
): Promise<CallToolResult> {
  const role = args.roleName.trim();
  const permissions = uniquePermissions(args.permissions);
  return updateSecurity(
    ctx,
    callerId,
    toolOperation('set_role_global_permissions', role),
    { kind: 'globalPermissions', role, permissions },
    { roleName: role, permissions, permissionCount: permissions.length, status: 'updated' }
  );
}

export async function handleSetRoleDefaultPathPermissions(
  ctx: ToolContext,
  callerId: string,
  args: { roleName: string; permissions: (typeof PATH_PERMISSIONS)[number][] }
): Promise<CallToolResult> {
  const role = args.roleName.trim();
  const permissions = uniquePermissions(args.permissions);
  return updateSecurity(
    ctx,
    callerId,
    toolOperation('set_role_default_path_permissions', role),
    { kind: 'defaultPathPermissions', role, permissions },
    { roleName: role, permissions, permissionCount: permissions.length, status: 'updated' }
  );
}

export async function handleSetRolePathPermissions(
  ctx: ToolContext,
  callerId: string,
  args: { roleName: string; path: string; permissions: (typeof PATH_PERMISSIONS)[number][] }
): Promise<CallToolResult> {
  const role = args.roleName.trim();
  const path = args.path.trim();
  const permissions = uniquePermissions(args.permissions);
  return updateSecurity(
    ctx,
    callerId,
    toolOperation('set_role_path_permissions', role, path),
    { kind: 'pathPermissions', role, path, permissions },
    { roleName: role, path, permissions, permissionCount: permissions.length, status: 'updated' }
  );
}

export async function handleRemoveRolePathPermissions(
  ctx: ToolContext,
  callerId: string,
  args: { roleName: string; path: string }
): Promise<CallToolResult> {
  const role = args.roleName.trim();
  const path = args.path.trim();
  return updateSecurity(
    ctx,
    callerId,
    toolOperation('remove_role_path_permissions', role, path),
    { kind: 'removePathPermissions', role, path },
    { roleName: role, path, status: 'removed' }
  );
}

export async function handleSetRoleIncludes(
  ctx: ToolContext,
  callerId: string,
  args: { roleName: string; includedRoles: string[] }
): Promise<CallToolResult> {
  const role = args.roleName.trim();
  const includedRoles = normalizeRoles(args.includedRoles);
  if (includedRoles.includes(role)) return toolError(`Invalid arguments: role ${role} cannot include itself`);
  return updateSecurity(
    ctx,
    callerId,
    toolOperation('set_role_includes', role),
    { kind: 'roleIncludes', role, includedRoles },
    { roleName: role, includedRoles, status: 'updated' }
  );
}

export async function handleLockRoleToPrincipal(
  ctx: ToolContext,
  callerId: string,
  args: { roleName: string; principalName: string }
): Promise<CallToolResult> {
  const role = args.roleName.trim();
  const principal = args.principalName.trim();
  return updateSecurity(
    ctx,
    callerId,
    toolOperation('lock_role_to_principal', role, principal),
    { kind: 'lockRole', role, principal },
    { roleName: role, principalName: principal, status: 'locked' }
  );
}

export async function handleIsolatePath(ctx: ToolContext, callerId: string, args: { path: string }): Promise<CallToolResult> {
  const path = args.path.trim();
  return updateSecurity(ctx, callerId, toolOperation('isolate_path', path), { kind: 'isolatePath', path }, { path, status: 'isolated' });
}

export async function handleDeisolatePath(ctx: ToolContext, callerId: string, args: { path: string }): Promise<CallToolResult> {
  const path = args.path.trim();
  return updateSecurity(
    ctx,
    callerId,
    toolOperation('deisolate_path', path),
    { kind: 'deisolatePath', path },
    { path, status: 'deisolated' }
  );
}

export async function handleAddPrincipal(
  ctx: ToolContext,
  callerId: string,
  args: { principalName: string; password: string; roles?: string[]; lockingPrincipal?: string }
): Promise<CallToolResult> {
  const principal = args.principalName.trim();
  const roles = normalizeRoles(args.roles ?? []);
  const lockingPrincipal = args.lockingPrincipal?.trim() || undefined;
  return updateAuthentication(
    ctx,
    callerId,
    toolOperation('add_principal', principal),
    {
      kind: 'addPrincipal',
      principal,
      password: args.password,
      roles,
      ...(lockingPrincipal !== undefined ? { lockingPrincipal } : {}),
    },
    {
      principalName: principal,
      roles,
      ...(lockingPrincipal !== undefined ? { lockingPrincipal } : {}),
      status: 'added',
    }
  );
}

export async function handleAssignPrincipalRoles(
  ctx: ToolContext,
  callerId: string,
  args: { principalName: string; roles: string[] }
): Promise<CallToolResult> {
  const principal = args.principalName.trim();
  const roles = normalizeRoles(args.roles);
  return updateAuthentication(
    ctx,
    callerId,
    toolOperation('assign_principal_roles', principal),
    { kind: 'assignRoles', principal, roles },
    { principalName: principal, roles, status: 'roles_assigned' }
  );
}

export async function handleSetPrincipalPassword(
  ctx: ToolContext,
  callerId: string,
  args: { principalName: string; password: string }
): Promise<CallToolResult> {
  const principal = args.principalName.trim();
  return updateAuthentication(
    ctx,
    callerId,
    toolOperation('set_principal_password', principal),
    { kind: 'setPassword', principal, password: args.password },
    { principalName: principal, status: 'password_updated' }
  );
}

export async function handleRemovePrincipal(
  ctx: ToolContext,
  callerId: string,
  args: { principalName: string }
): Promise<CallToolResult> {
  const principal = args.principalName.trim();
  return updateAuthentication(
    ctx,
    callerId,
    toolOperation('remove_principal', principal),
    { kind: 'removePrincipal', principal },
    { principalName: principal, status: 'removed' }
  );
}

export async function handleSetAnonymousConnectionPolicy(
  ctx: ToolContext,
  callerId: string,
  args: { action: (typeof ANONYMOUS_CONNECTION_ACTIONS)[number]; roles?: string[] }
): Promise<CallToolResult> {
  const operation = toolOperation('set_anonymous_connection_policy', args.action);
  if (args.action !== 'allow') {
    return updateAuthentication(
      ctx,
      callerId,
      operation,
      { kind: 'anonymousConnections', action: args.action },
      { action: args.action, status: 'policy_updated' }
    );
  }
  if (args.roles === undefined) return toolError("Roles must be specified when action is 'allow'");
  const roles = normalizeRoles(args.roles);
  return updateAuthentication(
    ctx,
    callerId,
    operation,
    { kind: 'anonymousConnections', action: 'allow', roles },
    { action: 'allow', roles, status: 'policy_updated' }
  );
}

export async function handleTrustClientProposedProperty(
  ctx: ToolContext,
  callerId: string,
  args: { propertyName: string; allowedValues: string[] }
): Promise<CallToolResult> {
  const property = args.propertyName.trim();
  const allowedValues = [...new Set(args.allowedValues.map((value) => value.trim()))].sort();
  return updateAuthentication(
    ctx,
    callerId,
    toolOperation('trust_client_proposed_property', property),
    { kind: 'trustProposedProperty', property, allowedValues },
    { propertyName: property, allowedValues, valueCount: allowedValues.length, status: 'trusted' }
  );
}

export async function handleIgnoreClientProposedProperty(
  ctx: ToolContext,
  callerId: string,
  args: { propertyName: string }
): Promise<CallToolResult> {
  const property = args.propertyName.trim();
  return updateAuthentication(
    ctx,
    callerId,
    toolOperation('ignore_client_proposed_property', property),
    { kind: 'ignoreProposedProperty', property },
    { propertyName: property, status: 'ignored' }
  );
}
