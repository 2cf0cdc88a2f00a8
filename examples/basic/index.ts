import { LatLng, LatLngF, normalizeRelative } from '../../src/index.js';

const tokyo = LatLng.of({ lat: 35.686991, lng: 139.539242 });
const osaka = LatLng.of({ lat: 34.598366, lng: 135.545261 });

console.log(`distance: ${tokyo.distanceFrom(osaka).toFixed(1)} m`);
console.log(`arrow from Osaka to Tokyo: ${tokyo.azimuthFrom(osaka).toFixed(2)} deg`);
console.log(`same arrow, relative: ${normalizeRelative(tokyo.azimuthFrom(osaka)).toFixed(2)} deg`);

const tokyoF = LatLngF.of(tokyo.toJSON());
const osakaF = LatLngF.of(osaka.toJSON());
console.log(`float32 distance: ${tokyoF.distanceFrom(osakaF)} m`);
