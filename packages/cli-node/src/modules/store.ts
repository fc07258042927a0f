/**
 * Capability stores - where the composer looks capability definitions up.
 */

import type { Capability, CapabilityLookup, CapabilityStore } from '../types.js';
import { deepFreeze } from './canonical.js';
import { listCapabilities, type InvalidCapabilityFile } from './loader.js';
import { compareVersions, selectHighestMatching } from './versions.js';

// =============================================================================
// In-Memory Store
// =============================================================================

/**
 * Registry of definitions held in memory. Several versions of a name may be
 * registered; lookups pick the highest version satisfying the constraint.
 */
export class InMemoryCapabilityStore implements CapabilityStore {
  private readonly versions = new Map<string, Map<string, Capability>>();

  constructor(capabilities: Iterable<Capability> = []) {
    for (const capability of capabilities) {
      this.register(capability);
    }
  }

  /** Add a definition, replacing one with the same name and version. The definition is frozen. */
  register(capability: Capability): this {
    deepFreeze(capability);
    let byVersion = this.versions.get(capability.name);
    if (!byVersion) {
      byVersion = new Map();
      this.versions.set(capability.name, byVersion);
    }
    byVersion.set(capability.version, capability);
    return this;
  }

  has(name: string, version?: string): boolean {
    const byVersion = this.versions.get(name);
    if (!byVersion) return false;
    return version === undefined || byVersion.has(version);
  }

  /** All definitions, sorted by name then version */
  list(): Capability[] {
    return [...this.versions.keys()].sort().flatMap(name =>
      [...(this.versions.get(name)?.values() ?? [])].sort((a, b) => compareVersions(a.version, b.version))
    );
  }

  async resolve(name: string, versionConstraint?: string): Promise<CapabilityLookup> {
    const byVersion = this.versions.get(name);
    if (!byVersion || byVersion.size === 0) {
      return { ok: false, reason: 'not_found', message: `Capability '${name}' not found` };
    }

    const available = [...byVersion.keys()].sort(compareVersions);
    const selected = selectHighestMatching(available, versionConstraint);
    const capability = selected === undefined ? undefined : byVersion.get(selected);
    if (!capability) {
      return {
        ok: false,
        reason: 'version_mismatch',
        message: `No version of '${name}' satisfies '${versionConstraint ?? '*'}' (available: ${available.join(', ')})`,
        available,
      };
    }
    return { ok: true, capability };
  }
}

// =============================================================================
// File Store
// =============================================================================

/**
 * Store backed by capability specification files on the search paths.
 * The paths are scanned once, on first use. When the same name and version
 * appear on several paths, the earlier path wins.
 */
export class FileCapabilityStore implements CapabilityStore {
  private loading: Promise<InMemoryCapabilityStore> | null = null;
  private skipped: InvalidCapabilityFile[] = [];

  constructor(private readonly searchPaths: string[]) {}

  async resolve(name: string, versionConstraint?: string): Promise<CapabilityLookup> {
    const store = await this.load();
    return store.resolve(name, versionConstraint);
  }

  async list(): Promise<Capability[]> {
    const store = await this.load();
    return store.list();
  }

  /** Files skipped during the scan because they failed validation */
  async invalidFiles(): Promise<InvalidCapabilityFile[]> {
    await this.load();
    return [...this.skipped];
  }

  /** Forget the scanned definitions; the next lookup rescans */
  reload(): void {
    this.loading = null;
  }

  private load(): Promise<InMemoryCapabilityStore> {
    if (!this.loading) {
      this.loading = this.scan();
    }
    return this.loading;
  }

  private async scan(): Promise<InMemoryCapabilityStore> {
    const { capabilities, invalid } = await listCapabilities(this.searchPaths);
    const store = new InMemoryCapabilityStore();
    for (const capability of capabilities) {
      if (!store.has(capability.name, capability.version)) {
        store.register(capability);
      }
    }
    this.skipped = invalid;
    return store;
  }
}
