import { type Request, type Response, Router } from 'express';
import { LOCATION_LOG_RANGE, LOCATION_TIME_ZONE } from '../../constants.ts';
import { errorMessage } from '../../lib/errors.ts';
import { formatIsoWithOffset } from '../../lib/time.ts';
import { LocationDataSchema } from '../../schemas/index.ts';
import type { Logger, Row, SheetsPort } from '../../types.ts';
import { asyncHandler } from '../async-handler.ts';
import { clientIp, hashIpAddress, sanitizeInput, sanitizeObject } from '../security.ts';

export interface LocationDeps {
  createSheets: () => SheetsPort;
  ipHashSalt: string;
  logger: Logger;
  now?: () => Date;
}

export interface ClientInfo {
  userAgent?: string | undefined;
  ipAddress: string | null;
}

export interface LocationResponse {
  success: boolean;
  message: string;
  timestamp: string;
}

/**
 * Validate a browser geolocation payload and append it to the location log.
 * Invalid bodies throw (a 422 upstream); storage failures are reported with success=false.
 */
export async function storeLocation(body: unknown, client: ClientInfo, deps: LocationDeps): Promise<LocationResponse> {
  const parsed = LocationDataSchema.parse(body);
  const now = deps.now ?? (() => new Date());
  const respond = (success: boolean, message: string): LocationResponse => ({ success, message, timestamp: formatIsoWithOffset(now(), LOCATION_TIME_ZONE) });

  try {
    const location = sanitizeObject(parsed);
    const userAgent = client.userAgent === undefined ? null : sanitizeInput(client.userAgent);
    const ipHash = hashIpAddress(client.ipAddress, deps.ipHashSalt);

    // timestamp, latitude, longitude, accuracy, altitude, altitude_accuracy, heading, speed, phone_number, message, user_agent, ip_address
    const row: Row = [
      formatIsoWithOffset(now(), LOCATION_TIME_ZONE),
      location.latitude,
      location.longitude,
      location.accuracy,
      location.altitude ?? null,
      location.altitude_accuracy ?? null,
      location.heading ?? null,
      location.speed ?? null,
      location.phone_number,
      location.message ?? null,
      userAgent,
      ipHash,
    ];

    const result = await deps.createSheets().appendValues({ range: LOCATION_LOG_RANGE, values: [row], valueInputOption: 'USER_ENTERED' });
    deps.logger.info({ range: result.appendedRange }, 'Stored location data');
    return respond(true, `Location data stored successfully. Appended to ${result.appendedRange}.`);
  } catch (error) {
    deps.logger.error({ error: errorMessage(error) }, 'Failed to store location data');
    return respond(false, `Failed to store location data: ${errorMessage(error)}`);
  }
}

export function createLocationRouter(deps: LocationDeps): Router {
  const router = Router();
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const result = await storeLocation(req.body, { userAgent: req.get('user-agent'), ipAddress: clientIp(req) }, deps);
      res.json(result);
    })
  );
  return router;
}
