// ── Geographic math utilities ────────────────────────────────────────────────

export interface LatLng {
  lat: number;
  lng: number;
}

export type CompassDirection =
  | "north"
  | "northeast"
  | "east"
  | "southeast"
  | "south"
  | "southwest"
  | "west"
  | "northwest"
  | "unknown";

const R = 6_371_008.8; // Mean Earth radius in meters
const toRad = (d: number) => (d * Math.PI) / 180;
const toDeg = (r: number) => (r * 180) / Math.PI;

// WGS-84 ellipsoid
const WGS84_A = 6_378_137;
const WGS84_F = 1 / 298.257223563;
const WGS84_B = (1 - WGS84_F) * WGS84_A;

const VINCENTY_MAX_ITERATIONS = 200;
const VINCENTY_TOLERANCE = 1e-12;

/** Haversine distance between two points in meters. */
export function haversineDistance(lat1: number, lng1: number, lat2: number, lng2: number): number {
  const dLat = toRad(lat2 - lat1);
  const dLng = toRad(lng2 - lng1);
  const a =
    Math.sin(dLat / 2) ** 2 + Math.cos(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.sin(dLng / 2) ** 2;
  return R * 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));
}

/**
 * Ellipsoidal distance in meters (Vincenty inverse on WGS-84), or null when
 * the iteration fails to converge, which only happens for nearly antipodal points.
 */
function vincentyDistance(lat1: number, lng1: number, lat2: number, lng2: number): number | null {
  // Longitude difference wrapped to [-180, 180)
  const L = toRad(((lng2 - lng1 + 540) % 360) - 180);
  const U1 = Math.atan((1 - WGS84_F) * Math.tan(toRad(lat1)));
  const U2 = Math.atan((1 - WGS84_F) * Math.tan(toRad(lat2)));
  const sinU1 = Math.sin(U1);
  const cosU1 = Math.cos(U1);
  const sinU2 = Math.sin(U2);
  const cosU2 = Math.cos(U2);

  let lambda = L;
  for (let i = 0; i < VINCENTY_MAX_ITERATIONS; i++) {
    const sinLambda = Math.sin(lambda);
    const cosLambda = Math.cos(lambda);
    const sinSigma = Math.sqrt(
      (cosU2 * sinLambda) ** 2 + (cosU1 * sinU2 - sinU1 * cosU2 * cosLambda) ** 2,
    );
    if (sinSigma === 0) return 0; // coincident points

    const cosSigma = sinU1 * sinU2 + cosU1 * cosU2 * cosLambda;
    const sigma = Math.atan2(sinSigma, cosSigma);
    const sinAlpha = (cosU1 * cosU2 * sinLambda) / sinSigma;
    const cosSqAlpha = 1 - sinAlpha ** 2;
    // Equatorial line: cosSqAlpha = 0
    const cos2SigmaM = cosSqAlpha !== 0 ? cosSigma - (2 * sinU1 * sinU2) / cosSqAlpha : 0;
    const C = (WGS84_F / 16) * cosSqAlpha * (4 + WGS84_F * (4 - 3 * cosSqAlpha));

    const prevLambda = lambda;
    lambda =
      L +
      (1 - C) *
        WGS84_F *
        sinAlpha *
        (sigma + C * sinSigma * (cos2SigmaM + C * cosSigma * (-1 + 2 * cos2SigmaM ** 2)));

    if (Math.abs(lambda) > Math.PI) return null;
    if (Math.abs(lambda - prevLambda) < VINCENTY_TOLERANCE) {
      const uSq = (cosSqAlpha * (WGS84_A ** 2 - WGS84_B ** 2)) / WGS84_B ** 2;
      const A = 1 + (uSq / 16384) * (4096 + uSq * (-768 + uSq * (320 - 175 * uSq)));
      const B = (uSq / 1024) * (256 + uSq * (-128 + uSq * (74 - 47 * uSq)));
      const deltaSigma =
        B *
        sinSigma *
        (cos2SigmaM +
          (B / 4) *
            (cosSigma * (-1 + 2 * cos2SigmaM ** 2) -
              (B / 6) * cos2SigmaM * (-3 + 4 * sinSigma ** 2) * (-3 + 4 * cos2SigmaM ** 2)));
      return WGS84_B * A * (sigma - deltaSigma);
    }
  }
  return null;
}

/**
 * Geodesic distance between two points in kilometers, measured on the WGS-84
 * ellipsoid. Falls back to the great-circle distance where Vincenty's
 * iteration does not converge.
 */
export function geodesicDistanceKm(from: LatLng, to: LatLng): number {
  const meters =
    vincentyDistance(from.lat, from.lng, to.lat, to.lng) ??
    haversineDistance(from.lat, from.lng, to.lat, to.lng);
  return Math.abs(meters) / 1000;
}

/** Forward azimuth (bearing) in degrees 0-360 from point 1 to point 2. */
export function computeBearing(lat1: number, lng1: number, lat2: number, lng2: number): number {
  const dLng = toRad(lng2 - lng1);
  const y = Math.sin(dLng) * Math.cos(toRad(lat2));
  const x =
    Math.cos(toRad(lat1)) * Math.sin(toRad(lat2)) -
    Math.sin(toRad(lat1)) * Math.cos(toRad(lat2)) * Math.cos(dLng);
  return (toDeg(Math.atan2(y, x)) + 360) % 360;
}

const OCTANTS: readonly CompassDirection[] = [
  "north",
  "northeast",
  "east",
  "southeast",
  "south",
  "southwest",
  "west",
  "northwest",
];

/**
 * Classify a bearing into one of eight 45° sectors centred on the cardinal and
 * intercardinal directions. Sector boundaries sit at odd multiples of 22.5°
 * and belong to the sector clockwise of them.
 */
export function compassDirection(bearing: number): CompassDirection {
  if (!(bearing >= 0 && bearing < 360)) return "unknown";
  const sector = Math.floor(((bearing + 22.5) % 360) / 45);
  return OCTANTS[sector] ?? "unknown";
}

/** Compass octant of the initial bearing from `origin` towards `target`. */
export function bearingDirection(origin: LatLng, target: LatLng): CompassDirection {
  return compassDirection(computeBearing(origin.lat, origin.lng, target.lat, target.lng));
}
