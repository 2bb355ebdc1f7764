import type { PolygonCoords, Position } from '../../../shared/geo.js';
import type { CreatePartnerInput } from '../partner.schemas.js';

export function square(minLng: number, minLat: number, maxLng: number, maxLat: number): PolygonCoords {
  return [[[minLng, minLat], [maxLng, minLat], [maxLng, maxLat], [minLng, maxLat], [minLng, minLat]]];
}

export function partnerInput(overrides: Partial<CreatePartnerInput> = {}): CreatePartnerInput {
  return {
    tradingName: 'Adega Teste',
    ownerName: 'Maria Teste',
    document: '00.000.000/0001-01',
    coverageArea: { type: 'MultiPolygon', coordinates: [square(-46.7, -23.6, -46.6, -23.5)] },
    address: { type: 'Point', coordinates: [-46.65, -23.55] },
    ...overrides,
  };
}

export function at(lng: number, lat: number): { type: 'Point'; coordinates: Position } {
  return { type: 'Point', coordinates: [lng, lat] };
}
