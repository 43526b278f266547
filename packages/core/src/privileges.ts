import type { PrivilegeLookup } from './types/report';

export const PRIVILEGED_GROUPS: ReadonlySet<string> = new Set(['wheel', 'admin', 'sudo']);

/**
 * Decides whether an account may act as administrator, from the sudoers
 * lines and the group table. Every call rescans both sources.
 */
export class PrivilegeResolver implements PrivilegeLookup {
  private readonly grantLines: readonly string[];
  private readonly groupLines: readonly string[];

  constructor(grantLines: readonly string[], groupLines: readonly string[]) {
    this.grantLines = Object.freeze([...grantLines]);
    this.groupLines = Object.freeze([...groupLines]);
  }

  isPrivileged(name: string): boolean {
    return this.hasGrant(name) || this.inPrivilegedGroup(name);
  }

  // Plain substring test: "bob" matches any line containing "bob ".
  private hasGrant(name: string): boolean {
    const needle = `${name} `;
    return this.grantLines.some((line) => line.includes(needle));
  }

  private inPrivilegedGroup(name: string): boolean {
    for (const line of this.groupLines) {
      const fields = line.trim().split(':');
      if (fields.length < 4) continue;

      const [groupName, , , members] = fields;
      if (!PRIVILEGED_GROUPS.has(groupName)) continue;

      if (members.split(',').some((member) => member === name)) {
        return true;
      }
    }
    return false;
  }
}
