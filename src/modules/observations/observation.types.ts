/**
 * Observation: one GOES X-ray flux reading (0.1-0.8 nm, W/m²) at one instant.
 * Unique per timestamp.
 */
export interface Observation {
  timestamp: Date;
  flux: number;
}

export interface ObservationDto {
  timestamp: string;
  flux: number;
}

export interface HistoricalObservationsResponse {
  ok: true;
  record_count: number;
  timeframe_hours: number;
  data: ObservationDto[];
}

export function toObservationDto(o: Observation): ObservationDto {
  return { timestamp: o.timestamp.toISOString(), flux: o.flux };
}
