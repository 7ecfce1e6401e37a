export type ComponentLabel = 'X' | 'Y' | 'Z' | 'H' | 'D';

export type ComponentTriplet = 'XYZ' | 'HDZ';

export const TRIPLET_LABELS: Record<ComponentTriplet, readonly [ComponentLabel, ComponentLabel, ComponentLabel]> = {
  XYZ: ['X', 'Y', 'Z'],
  HDZ: ['H', 'D', 'Z']
};

/** The two horizontal-field components of a triplet. */
export type HorizontalComponents = readonly [ComponentLabel, ComponentLabel];

export const horizontalComponents = (triplet: ComponentTriplet): HorizontalComponents => {
  const [first, second] = TRIPLET_LABELS[triplet];
  return [first, second];
};

export type ComponentValues = Partial<Record<ComponentLabel, number | null>>;

export interface Sample {
  timestamp: Date;
  /** `null` marks a missing reading. */
  values: ComponentValues;
}

export interface ParsedFile {
  samples: Sample[];
  triplet: ComponentTriplet;
  components: HorizontalComponents;
  stationCode: string;
  stationName: string;
}

export interface Window {
  blockIndex: number;
  start: Date;
  center: Date;
  sampleCount: number;
  disturbance: number;
}

export type KIndexValue = 0.25 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

export interface KIndexResult {
  value: KIndexValue;
  windowCenter: Date;
  disturbance: number;
}

export interface RawObservatoryFile {
  name: string;
  content: string;
}

export interface RejectedFile {
  name: string;
  reason: string;
}

export interface KIndexReport {
  station: string;
  stationName: string;
  triplet: ComponentTriplet | null;
  components: HorizontalComponents | null;
  generatedAt: Date;
  samples: Sample[];
  windows: Window[];
  results: KIndexResult[];
  latest: KIndexResult | null;
  files: {
    accepted: string[];
    rejected: RejectedFile[];
  };
}
