/**
 * Bookkeeping for binary artifacts of a package workspace, keyed by
 * package location then target name, with JSON persistence.
 */
import { z } from "zod";

export const artifactSourceSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("local") }),
  z.object({ type: z.literal("remote"), url: z.string().min(1), checksum: z.string().min(1) }),
]);

export const packageRefSchema = z.object({
  identity: z.string().min(1),
  name: z.string().min(1),
  location: z.string().min(1),
});

export const managedArtifactSchema = z.object({
  packageRef: packageRefSchema,
  targetName: z.string().min(1),
  source: artifactSourceSchema,
  path: z.string().min(1),
});

export const managedArtifactsSchema = z.array(managedArtifactSchema);

export type ArtifactSource = z.infer<typeof artifactSourceSchema>;
export type PackageRef = z.infer<typeof packageRefSchema>;
export type ManagedArtifact = z.infer<typeof managedArtifactSchema>;

export function describeSource(source: ArtifactSource): string {
  switch (source.type) {
    case "local":
      return "local";
    case "remote":
      return `remote(url: ${source.url}, checksum: ${source.checksum})`;
  }
}

export function describeArtifact(artifact: ManagedArtifact): string {
  return `${artifact.packageRef.name}.${artifact.targetName} ${describeSource(artifact.source)} ${artifact.path}`;
}

export class ManagedArtifacts implements Iterable<ManagedArtifact> {
  private byLocation = new Map<string, Map<string, ManagedArtifact>>();

  constructor(artifacts: Iterable<ManagedArtifact> = []) {
    for (const a of artifacts) this.add(a);
  }

  /** Adds or replaces the artifact for its package location and target. */
  add(artifact: ManagedArtifact): void {
    let targets = this.byLocation.get(artifact.packageRef.location);
    if (!targets) {
      targets = new Map();
      this.byLocation.set(artifact.packageRef.location, targets);
    }
    targets.set(artifact.targetName, artifact);
  }

  /** Returns whether an artifact was removed. */
  remove(location: string, targetName: string): boolean {
    const targets = this.byLocation.get(location);
    if (!targets) return false;
    const removed = targets.delete(targetName);
    if (targets.size === 0) this.byLocation.delete(location);
    return removed;
  }

  byPackageLocation(location: string, targetName: string): ManagedArtifact | undefined {
    return this.byLocation.get(location)?.get(targetName);
  }

  byPackageName(name: string, targetName: string): ManagedArtifact | undefined {
    for (const a of this) {
      if (a.packageRef.name === name && a.targetName === targetName) return a;
    }
    return undefined;
  }

  get size(): number {
    let n = 0;
    for (const targets of this.byLocation.values()) n += targets.size;
    return n;
  }

  *[Symbol.iterator](): Iterator<ManagedArtifact> {
    for (const targets of this.byLocation.values()) {
      yield* targets.values();
    }
  }

  toJSON(): ManagedArtifact[] {
    return [...this];
  }

  /** Validates `data` as a list of artifacts. Throws a ZodError when it is malformed. */
  static fromJSON(data: unknown): ManagedArtifacts {
    return new ManagedArtifacts(managedArtifactsSchema.parse(data));
  }
}
