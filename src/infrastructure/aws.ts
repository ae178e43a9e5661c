/**
 * AWS CLI profile handling. Profiles come from the shared config and
 * credentials files the same way the AWS CLI reads them.
 */
import { S3Client } from '@aws-sdk/client-s3';
import { fromIni } from '@aws-sdk/credential-provider-ini';
import { loadSharedConfigFiles } from '@smithy/shared-ini-file-loader';

import { AwsProfileNotFoundError } from '../errors.js';

// Non-profile sections the loader keeps under a prefixed key.
const NON_PROFILE_SECTION = /^(sso-session|services)\./;

/** Profile names from ~/.aws/config and ~/.aws/credentials, sorted. */
export async function listProfiles(): Promise<string[]> {
  const { configFile, credentialsFile } = await loadSharedConfigFiles();
  const names = new Set([
    ...Object.keys(configFile),
    ...Object.keys(credentialsFile),
  ]);
  return [...names].filter((name) => !NON_PROFILE_SECTION.test(name)).sort();
}

export async function assertProfileExists(profile: string): Promise<void> {
  const available = await listProfiles();
  if (!available.includes(profile)) {
    throw new AwsProfileNotFoundError(profile, available);
  }
}

/** The `region` set for a profile in ~/.aws/config, if any. */
export async function profileRegion(profile: string): Promise<string | null> {
  const { configFile } = await loadSharedConfigFiles();
  return configFile[profile]?.region ?? null;
}

/**
 * S3 client bound to a CLI profile. An explicit region wins over the
 * profile's; with neither, the SDK's own region chain applies.
 */
export async function createS3Client(
  profile: string,
  region: string | null,
): Promise<S3Client> {
  await assertProfileExists(profile);
  const resolvedRegion = region ?? (await profileRegion(profile));
  return new S3Client({
    credentials: fromIni({ profile }),
    ...(resolvedRegion ? { region: resolvedRegion } : {}),
  });
}
