export type TrackPoint = {
  lat: number;
  lng: number;
  time?: string;
  accuracy?: number;
  elevation?: number;
};

export type Track = {
  name?: string;
  points: TrackPoint[];
};

export type Batch = {
  index: number;
  /** Index of the batch's first point in the track. */
  start: number;
  points: TrackPoint[];
};

export type SnapStatus = "success" | "partial" | "failure";

export type SnapResult =
  | {
      batchIndex: number;
      status: "success" | "partial";
      points: TrackPoint[];
      matchedCount: number;
      attempts: number;
    }
  | {
      batchIndex: number;
      status: "failure";
      error: string;
      attempts: number;
    };

export type SegmentReport = {
  batchIndex: number;
  start: number;
  end: number;
  status: SnapStatus;
  attempts: number;
  error?: string;
};

export type CorrectedTrack = {
  name?: string;
  points: TrackPoint[];
  segments: SegmentReport[];
  degradedCount: number;
  partialCount: number;
};
