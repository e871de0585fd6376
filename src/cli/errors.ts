/**
 * Raised for unusable settings: a malformed config file or a bad value.
 */
export class SettingsError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SettingsError'
  }
}

/**
 * Raised before any API call when no client id or API key was supplied.
 */
export class MissingCredentialsError extends SettingsError {
  constructor() {
    super(
      'Could not find DigitalOcean values for client id and API key. ' +
        'They must be specified via the config file (clientId, apiKey), ' +
        'command line arguments (--client-id and --api-key), ' +
        'or environment variables (DIGITALOCEAN_CLIENT_ID and DIGITALOCEAN_API_KEY).'
    )
    this.name = 'MissingCredentialsError'
  }
}
