/**
 * DefaultMountFactory — the project directory at the mount point, plus the
 * caller's AWS CLI directory so the container can use the same profiles.
 */
import fs from 'fs';

import { logger } from '../logger.js';
import type { IMountFactory, MountPlan, VolumeMount } from './mount-factory.js';

export class DefaultMountFactory implements IMountFactory {
  buildMounts(plan: MountPlan): VolumeMount[] {
    const mounts: VolumeMount[] = [
      {
        hostPath: plan.projectDir,
        containerPath: plan.mountDir,
        readonly: false,
        relabel: true,
      },
    ];

    // Writable: SSO logins refresh their token cache under ~/.aws
    if (fs.existsSync(plan.awsDir)) {
      mounts.push({
        hostPath: plan.awsDir,
        containerPath: plan.containerAwsDir,
        readonly: false,
        relabel: true,
      });
    } else {
      logger.warn({ awsDir: plan.awsDir }, 'AWS CLI directory not found, container will run without credentials');
    }

    return mounts;
  }
}
