/**
 * Read-only report of where every declared repository stands on disk
 */

import { existsSync, readdirSync, statSync } from 'fs';
import { join, resolve } from 'path';
import { isCheckoutName, repositoryName, sameRemote } from './remote-url.js';
import type {
  ContainerNode,
  LayoutForest,
  RepositoryStatus,
  VersionControl,
} from '../../shared/types.js';

export class StatusInspector {
  constructor(private vcs: VersionControl) {}

  inspect(forest: LayoutForest): RepositoryStatus[] {
    const statuses: RepositoryStatus[] = [];
    for (const root of forest) {
      this.collect(root, resolve(root.label), statuses);
    }
    return statuses;
  }

  private collect(node: ContainerNode, path: string, statuses: RepositoryStatus[]): void {
    for (const child of node.children) {
      if (child.kind === 'directory') {
        this.collect(child, join(path, child.label), statuses);
        continue;
      }

      const name = repositoryName(child.label);
      if (!isCheckoutName(name)) {
        statuses.push({ url: child.label, parent: path, checkout: path, state: 'unusable-url' });
        continue;
      }

      const checkout = join(path, name);
      statuses.push({ url: child.label, parent: path, checkout, ...this.describe(checkout, child.label) });
    }
  }

  private describe(checkout: string, url: string): Pick<RepositoryStatus, 'state' | 'actualRemote'> {
    if (!existsSync(checkout)) return { state: 'missing' };
    if (statSync(checkout).isDirectory() && readdirSync(checkout).length === 0) {
      return { state: 'empty' };
    }

    const remote = this.vcs.queryRemote(checkout);
    switch (remote.state) {
      case 'not-a-working-copy':
        return { state: 'not-a-working-copy' };
      case 'unbound':
        return { state: 'unbound' };
      case 'bound':
        return sameRemote(remote.url, url)
          ? { state: 'matching', actualRemote: remote.url }
          : { state: 'mismatched', actualRemote: remote.url };
    }
  }
}

export function formatStatus(status: RepositoryStatus): string {
  switch (status.state) {
    case 'unusable-url':
      return `[bad url]    ${status.url} (no checkout directory name)`;
    case 'missing':
      return `[missing]    ${status.checkout} (${status.url})`;
    case 'empty':
      return `[empty]      ${status.checkout} (${status.url})`;
    case 'not-a-working-copy':
      return `[not git]    ${status.checkout} (${status.url})`;
    case 'unbound':
      return `[no remote]  ${status.checkout} (${status.url})`;
    case 'matching':
      return `[ok]         ${status.checkout} (${status.url})`;
    case 'mismatched':
      return `[mismatch]   ${status.checkout} (expected ${status.url}, found ${status.actualRemote ?? 'none'})`;
  }
}
