/**
 * Fatal errors raised by sortie. The CLI reports the category next to the
 * message so a user can tell configuration mistakes from AWS problems.
 */
export class SortieError extends Error {
  constructor(
    message: string,
    public readonly category: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SortieError';
  }
}

export class ConfigFileNotFoundError extends SortieError {
  constructor(public readonly filePath: string) {
    super(`Supplied config file not found: ${filePath}`, 'Bad Config File Path', { filePath });
    this.name = 'ConfigFileNotFoundError';
  }
}

export class ConfigMissingKeyError extends SortieError {
  constructor(section: string, key: string, filePath: string) {
    super(
      `Key ['${section}']['${key}'] not present in '${filePath}'.`,
      'User Configuration Error',
      { section, key, filePath },
    );
    this.name = 'ConfigMissingKeyError';
  }
}

export class AwsProfileNotFoundError extends SortieError {
  constructor(profile: string, available: string[]) {
    super(
      `Specified profile '${profile}' is not in your AWS CLI configuration.  Available options are: ${available.join(', ') || '(none)'}`,
      'User Configuration Error',
      { profile, available },
    );
    this.name = 'AwsProfileNotFoundError';
  }
}

export class InvalidPermissionsError extends SortieError {
  constructor(message: string, operation: string, cause?: unknown) {
    super(message, 'Permissions Issue', { operation }, { cause });
    this.name = 'InvalidPermissionsError';
  }
}

export class InvalidValueError extends SortieError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'Configuration Issue', details);
    this.name = 'InvalidValueError';
  }
}

export class ContainerRuntimeError extends SortieError {
  constructor(message: string, cause?: unknown) {
    super(message, 'Container Runtime', undefined, { cause });
    this.name = 'ContainerRuntimeError';
  }
}

export class ContainerBuildError extends SortieError {
  constructor(image: string, exitCode: number | null) {
    super(
      `Building image '${image}' failed with exit code ${exitCode}`,
      'Container Build',
      { image, exitCode },
    );
    this.name = 'ContainerBuildError';
  }
}
