// File: src/config/constants.ts
// Configuration constants for the application

/**
 * Region used for account-independent calls (region discovery, STS, Organizations)
 */
export const DEFAULT_REGION = 'us-east-1'

/**
 * Default role name to assume in target accounts for cross-account access
 */
export const DEFAULT_ROLE_NAME = 'OrganizationAccountAccessRole'

/**
 * Where the generated documentation is written
 */
export const DEFAULT_BUCKET_NAME = 'your-documentation-bucket'
export const DEFAULT_OBJECT_KEY = 'network-documentation.json'

/**
 * Lifetime of assumed-role sessions, in seconds
 */
export const DEFAULT_SESSION_DURATION = 3600

/**
 * Default output format for command results
 */
export const DEFAULT_OUTPUT_FORMAT = 'table'

/**
 * Application name and version information
 */
export const APP_NAME = 'aws-netdoc'
export const APP_DESCRIPTION = 'CLI tool to document networking resources across an AWS Organization'
export const APP_VERSION = '0.1.0'
