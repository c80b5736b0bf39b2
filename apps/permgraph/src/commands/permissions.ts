/**
 * Known permission listing
 */

import type { PermissionInfo } from '@permgraph/core';
import { Command } from 'commander';
import { type GlobalOptions, openSession } from '../session';
import { printData } from '../utils/output';

type PermissionsOptions = GlobalOptions & {
  category?: string;
  match?: string;
};

export function createPermissionsCommand(): Command {
  return new Command('permissions')
    .description('List the permissions declared in the snapshot')
    .argument('[query]', 'Only permissions whose name or description contains this')
    .option('--category <category>', 'Only permissions in this category')
    .option('--match <wildcard>', 'Only permissions covered by a wildcard, e.g. build.*')
    .action((query: string | undefined, _options: unknown, command: Command) => {
      const options = command.optsWithGlobals<PermissionsOptions>();
      const { registry } = openSession(options).snapshot;

      let permissions: PermissionInfo[];
      if (options.category !== undefined) {
        permissions = registry.getByCategory(options.category);
      } else if (query !== undefined) {
        permissions = registry.search(query);
      } else {
        permissions = registry
          .getAll()
          .sort((a, b) => (a.permission < b.permission ? -1 : a.permission > b.permission ? 1 : 0));
      }
      if (query !== undefined && options.category !== undefined) {
        const lowerQuery = query.toLowerCase();
        permissions = permissions.filter(
          (p) => p.permission.includes(lowerQuery) || p.description.toLowerCase().includes(lowerQuery)
        );
      }
      if (options.match !== undefined) {
        const covered = registry.getMatchingPermissions(options.match);
        permissions = permissions.filter((p) => covered.has(p.permission));
      }

      printData(permissions, {
        headers: ['PERMISSION', 'CATEGORY', 'DESCRIPTION'],
        getRow: (p) => [p.permission, p.category, p.description],
      });
    });
}
