/**
 * IMountFactory — builds the bind mounts for a launch.
 * Kept apart from the launcher so it can be tested and swapped.
 */

export interface VolumeMount {
  hostPath: string;
  containerPath: string;
  readonly: boolean;
  /** Relabel for SELinux as private to this container (`:Z`). */
  relabel: boolean;
}

export interface MountPlan {
  projectDir: string;
  mountDir: string;
  awsDir: string;
  containerAwsDir: string;
}

export interface IMountFactory {
  buildMounts(plan: MountPlan): VolumeMount[];
}
