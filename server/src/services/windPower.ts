import { AIR_DENSITY } from '../constants';

const isNumber = (value: number | null | undefined): value is number =>
    value !== null && value !== undefined && Number.isFinite(value);

/**
 * Horizontal wind speed (m/s) from u/v components. Null when either component is missing.
 */
export function windSpeed(u: number | null | undefined, v: number | null | undefined): number | null {
    if (!isNumber(u) || !isNumber(v)) return null;
    return Math.hypot(u, v);
}

/**
 * Wind power density (W/m²) = ½ · ρ · v³.
 * Missing or non-finite components give null instead of throwing.
 */
export function windPowerDensity(
    u: number | null | undefined,
    v: number | null | undefined,
    airDensity: number = AIR_DENSITY
): number | null {
    const speed = windSpeed(u, v);
    if (speed === null) return null;
    return 0.5 * airDensity * speed ** 3;
}

/**
 * u/v components from meteorological speed and direction (degrees the wind blows from).
 */
export function windComponents(
    speed: number | null | undefined,
    directionDeg: number | null | undefined
): { u: number | null; v: number | null } {
    if (!isNumber(speed) || !isNumber(directionDeg)) return { u: null, v: null };
    const rad = directionDeg * (Math.PI / 180);
    return { u: -speed * Math.sin(rad), v: -speed * Math.cos(rad) };
}
