/**
 * Common Zod schema primitives shared by agent specs, deployment records
 * and configuration.
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().min(1, 'Cannot be empty');

/**
 * Non-negative integer validator
 */
export const NonNegativeInteger = z
  .number()
  .int('Must be an integer')
  .min(0, 'Must be non-negative');

/**
 * Non-negative number validator
 */
export const NonNegativeNumber = z.number().min(0, 'Must be non-negative');

/**
 * Ratio in the closed range [0, 1]
 */
export const UnitInterval = z
  .number()
  .min(0, 'Must be at least 0')
  .max(1, 'Cannot exceed 1');

/**
 * Traffic split percentage (integer 1-100)
 */
export const TrafficSplitPercent = z
  .number()
  .int('Traffic split must be an integer')
  .min(1, 'Traffic split must be at least 1%')
  .max(100, 'Traffic split cannot exceed 100%');

/**
 * ISO-8601 timestamp string
 */
export const IsoTimestamp = z.string().datetime({ message: 'Must be an ISO-8601 timestamp' });
