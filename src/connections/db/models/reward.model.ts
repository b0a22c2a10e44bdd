// Reward Model - Based on migration 20251201_000004_create_rewards_table

export interface Reward {
  id: number;
  name: string;
  description: string;
  image: string | null;
  created_at: Date;
  updated_at: Date;
}
