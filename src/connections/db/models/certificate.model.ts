// Certificate Model - Based on migration 20251201_000006_create_certificates_table

export interface Certificate {
  id: number;
  application_id: number;
  file: string; // path relative to the upload root
  original_name: string | null;
  file_size: number | null;
  created_at: Date;
  updated_at: Date;
}
