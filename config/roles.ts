import fs from 'fs';
import { fileURLToPath } from 'url';

export const ROLE_NAMES = [
  'employee',
  'developer',
  'intern',
  'sales_executive',
  'sales_manager',
  'team_lead',
  'manager',
  'dev_manager',
  'hr',
  'admin',
] as const;

export type Role = (typeof ROLE_NAMES)[number];

export const CAPABILITIES = [
  'leave:request',
  'leave:approve',
  'leave:view_team',
  'leave:admin_override',
  'users:manage',
] as const;

export type Capability = (typeof CAPABILITIES)[number];

export interface RoleTable {
  readonly capabilities: ReadonlyMap<Role, ReadonlySet<Capability>>;
  readonly aliases: ReadonlyMap<string, Role>;
}

export function isRole(value: string): value is Role {
  return ROLE_NAMES.some((role) => role === value);
}

export function isCapability(value: string): value is Capability {
  return CAPABILITIES.some((capability) => capability === value);
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Validates the parsed contents of roles.json. Every canonical role must be
 * listed, every capability must be known and every alias must point at a
 * canonical role.
 */
export function parseRoleTable(raw: unknown): RoleTable {
  if (!isRecord(raw) || !isRecord(raw.roles)) {
    throw new Error('Role table must contain a "roles" object');
  }

  const capabilities = new Map<Role, ReadonlySet<Capability>>();
  for (const role of ROLE_NAMES) {
    const listed = raw.roles[role];
    if (!Array.isArray(listed)) {
      throw new Error(`Role table is missing capabilities for "${role}"`);
    }
    const set = new Set<Capability>();
    for (const entry of listed) {
      if (typeof entry !== 'string' || !isCapability(entry)) {
        throw new Error(`Unknown capability "${String(entry)}" on role "${role}"`);
      }
      set.add(entry);
    }
    capabilities.set(role, set);
  }

  const aliases = new Map<string, Role>();
  const rawAliases = raw.aliases ?? {};
  if (!isRecord(rawAliases)) {
    throw new Error('Role aliases must be an object');
  }
  for (const [alias, target] of Object.entries(rawAliases)) {
    if (typeof target !== 'string' || !isRole(target)) {
      throw new Error(`Alias "${alias}" points at unknown role "${String(target)}"`);
    }
    aliases.set(alias, target);
  }

  return Object.freeze({ capabilities, aliases });
}

const loadRoleTable = (): RoleTable => {
  const file = fileURLToPath(new URL('./roles.json', import.meta.url));
  const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
  return parseRoleTable(raw);
};

export const roleTable: RoleTable = loadRoleTable();

// Stored roles come from several front ends: "Team Lead", "team-lead", "TEAMLEAD".
export function normalizeRole(raw: string | null | undefined, table: RoleTable = roleTable): Role {
  if (!raw) return 'employee';
  const key = raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
  if (isRole(key)) return key;
  return table.aliases.get(key) ?? table.aliases.get(key.replace(/_/g, '')) ?? 'employee';
}

export function hasCapability(role: Role, capability: Capability, table: RoleTable = roleTable): boolean {
  return table.capabilities.get(role)?.has(capability) ?? false;
}
