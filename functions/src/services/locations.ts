import { z } from 'zod';
import { getFirestoreDb } from '../utils/firestore';
import { InvalidFeatureError, LocationNotFoundError } from '../utils/errors';

export const LOCATIONS_COLLECTION = 'locations';

export type LocationInput = {
  location?: string;
  locationId?: string;
};

const savedLocationSchema = z.object({ name: z.string().trim().min(1) });

/**
 * A free-text `location` wins; otherwise `locationId` names a saved farm
 * location whose `name` field is what the weather supplier is queried with.
 */
export async function resolveLocation(input: LocationInput): Promise<string> {
  const location = input.location?.trim();
  if (location) return location;

  const locationId = input.locationId?.trim();
  if (!locationId) {
    throw new InvalidFeatureError('Either location or locationId is required', ['location', 'locationId']);
  }

  const snap = await getFirestoreDb().collection(LOCATIONS_COLLECTION).doc(locationId).get();
  if (!snap.exists) throw new LocationNotFoundError(locationId);

  const parsed = savedLocationSchema.safeParse(snap.data());
  if (!parsed.success) throw new LocationNotFoundError(locationId);
  return parsed.data.name;
}
