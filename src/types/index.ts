export interface Activity {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

// Seed and listing shape: activity name -> activity record
export type ActivityMap = Record<string, Activity>;

export interface ActivityView extends Activity {
  name: string;
}

export interface ActivityDocument {
  email: string;
  filename: string;
  content_type: string;
  score: number;
  verified: boolean;
}

export type DocumentSubmission = Omit<ActivityDocument, 'verified'>;

export interface ParticipantScore {
  email: string;
  score: number | null;
}

export interface MessageResponse {
  message: string;
}

export const ACTIVITY_SORT_FIELDS = ['name', 'participants', 'score'] as const;
export type ActivitySortField = typeof ACTIVITY_SORT_FIELDS[number];

export const PARTICIPANT_SORT_FIELDS = ['name', 'score'] as const;
export type ParticipantSortField = typeof PARTICIPANT_SORT_FIELDS[number];
