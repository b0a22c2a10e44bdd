// Application Model - Based on migration 20251201_000005_create_applications_table

import { ApplicationStatus, AreaCode } from '../../../constants/application.constants';

export interface Application {
  id: number;
  reward_id: number;
  user_id: number;
  status: ApplicationStatus;
  area: AreaCode;
  district: string;
  neighborhood: string;
  activity: string;
  activity_description: string;
  recommendation_letter: string | null;
  source: string | null;
  created_at: Date;
  updated_at: Date;
}

export interface CreateApplicationInput {
  reward_id: number;
  user_id: number;
  area: AreaCode;
  district: string;
  neighborhood: string;
  activity: string;
  activity_description: string;
  recommendation_letter: string | null;
  source?: string;
}
