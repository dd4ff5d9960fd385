/**
 * Services Index
 */

export {
  AvailabilityService,
  getAvailabilityService,
  resetAvailabilityService,
} from './availability-service.js';
