import type { Requester } from "./types.js";

export interface TriggerAuthorizer {
  canManage(guildId: string, requester: Requester): boolean;
}

export interface AdminRoleLookup {
  getAdminRoleId(guildId: string): string | null;
}

export interface PermissionConfig {
  readonly adminUserIds: readonly string[];
  readonly managerRoleId?: string;
}

export function canManageTriggers(
  requester: Requester,
  adminRoleId: string | null,
  adminUserIds: readonly string[],
): boolean {
  if (adminUserIds.includes(requester.userId)) return true;
  if (requester.isAdministrator) return true;
  if (adminRoleId) return requester.roleIds.includes(adminRoleId);
  // No role picked for this guild yet
  return requester.canManageGuild;
}

export class GuildPermissions implements TriggerAuthorizer {
  constructor(
    private readonly roles: AdminRoleLookup,
    private readonly config: PermissionConfig,
  ) {}

  adminRoleFor(guildId: string): string | null {
    return this.roles.getAdminRoleId(guildId) ?? this.config.managerRoleId ?? null;
  }

  canManage(guildId: string, requester: Requester): boolean {
    return canManageTriggers(
      requester,
      this.adminRoleFor(guildId),
      this.config.adminUserIds,
    );
  }
}
