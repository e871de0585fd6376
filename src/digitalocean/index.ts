/**
 * DigitalOcean Module
 */

export {
  createDigitalOceanClient,
  DEFAULT_API_BASE_URL,
  type DigitalOceanClient,
  type DigitalOceanClientConfig,
  isDropletRecord,
  isRegion
} from './client'
export { DigitalOceanApiError, unwrap } from './errors'
