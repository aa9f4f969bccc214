/**
 * Environment Detection
 *
 * Utilities for detecting the runtime environment (CI, debug tracing).
 * Used by the console formatter to decide on colors and by the observer
 * to decide on tracing.
 */

/**
 * CI environment variable names to check.
 */
const CI_ENV_VARS = [
    'CI',
    'CONTINUOUS_INTEGRATION',
    'GITHUB_ACTIONS',
    'GITLAB_CI',
    'CIRCLECI',
    'TRAVIS',
    'JENKINS_URL',
    'BUILDKITE',
    'TEAMCITY_VERSION',
    'TF_BUILD',
    'BITBUCKET_BUILD_NUMBER',
];

/**
 * Detect if running in a CI/headless environment.
 *
 * Checks for:
 * - LOG_HEADLESS=true environment variable
 * - Common CI environment variables
 *
 * @example
 * ```typescript
 * if (isCi()) {
 *     // Plain output, no colors
 * }
 * ```
 */
export function isCi(env: NodeJS.ProcessEnv = process.env): boolean {

    if (env['LOG_HEADLESS'] === 'true') {

        return true;

    }

    for (const envVar of CI_ENV_VARS) {

        if (env[envVar]) {

            return true;

        }

    }

    return false;

}

/**
 * Check if observer tracing is enabled.
 *
 * @returns true if LOG_DEBUG is set
 */
export function isDebug(env: NodeJS.ProcessEnv = process.env): boolean {

    return env['LOG_DEBUG'] === 'true' || env['LOG_DEBUG'] === '1';

}
