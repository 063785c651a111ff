import { isCachedCoordinates, type CachedCoordinates } from "../geocode/nominatim";
import { isAreaFeatures } from "../osm/features";
import { isStreetGraph } from "../osm/streetGraph";
import type { AreaFeatures, StreetGraph } from "../osm/types";
import { KeyValueCache } from "./keyValueCache";
import type { CacheBackend } from "./storeBackends";

export interface PosterCaches {
  coordinates: KeyValueCache<CachedCoordinates>;
  streetGraphs: KeyValueCache<StreetGraph>;
  areas: KeyValueCache<AreaFeatures>;
}

export function createPosterCaches(backend: CacheBackend): PosterCaches {
  return {
    coordinates: new KeyValueCache({ name: "coordinates", backend, isValue: isCachedCoordinates }),
    streetGraphs: new KeyValueCache({ name: "street graph", backend, isValue: isStreetGraph }),
    areas: new KeyValueCache({ name: "area features", backend, isValue: isAreaFeatures })
  };
}
