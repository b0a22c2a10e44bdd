/**
 * Application Status Constants
 * Pipeline: submitted -> neighborhood -> district -> region -> final_review -> awarded | rejected
 */
export const APPLICATION_STATUS = {
  SUBMITTED: 'submitted',
  NEIGHBORHOOD: 'neighborhood',
  DISTRICT: 'district',
  REGION: 'region',
  FINAL_REVIEW: 'final_review',
  AWARDED: 'awarded',
  REJECTED: 'rejected',
} as const;

export type ApplicationStatus = typeof APPLICATION_STATUS[keyof typeof APPLICATION_STATUS];

export const APPLICATION_STATUSES: readonly ApplicationStatus[] = Object.values(APPLICATION_STATUS);

export const APPLICATION_STATUS_LABELS: Record<ApplicationStatus, string> = {
  submitted: 'Submitted',
  neighborhood: 'Neighborhood review',
  district: 'District review',
  region: 'Region review',
  final_review: 'Final review',
  awarded: 'Awarded',
  rejected: 'Rejected',
};

/**
 * Stages that still have a reviewer working on them
 */
export const IN_PROCESS_STATUSES: readonly ApplicationStatus[] = [
  APPLICATION_STATUS.NEIGHBORHOOD,
  APPLICATION_STATUS.DISTRICT,
  APPLICATION_STATUS.REGION,
];

// Counted as "pending" on the reward detail
export const PENDING_STATUSES: readonly ApplicationStatus[] = [
  APPLICATION_STATUS.SUBMITTED,
  ...IN_PROCESS_STATUSES,
];

export const isApplicationStatus = (value: string): value is ApplicationStatus =>
  APPLICATION_STATUSES.some(status => status === value);

/**
 * Region codes accepted in `applications.area`
 */
export const AREA = {
  ANDIJAN: 'andijan',
  BUKHARA: 'bukhara',
  FERGANA: 'fergana',
  JIZZAKH: 'jizzakh',
  NAMANGAN: 'namangan',
  NAVOI: 'navoi',
  KASHKADARYA: 'kashkadarya',
  KARAKALPAKSTAN: 'karakalpakstan',
  SAMARKAND: 'samarkand',
  SYRDARYA: 'syrdarya',
  SURKHANDARYA: 'surkhandarya',
  TASHKENT_REGION: 'tashkent_region',
  TASHKENT_CITY: 'tashkent_city',
  KHOREZM: 'khorezm',
} as const;

export type AreaCode = typeof AREA[keyof typeof AREA];

export const AREA_CODES = [
  AREA.ANDIJAN,
  AREA.BUKHARA,
  AREA.FERGANA,
  AREA.JIZZAKH,
  AREA.NAMANGAN,
  AREA.NAVOI,
  AREA.KASHKADARYA,
  AREA.KARAKALPAKSTAN,
  AREA.SAMARKAND,
  AREA.SYRDARYA,
  AREA.SURKHANDARYA,
  AREA.TASHKENT_REGION,
  AREA.TASHKENT_CITY,
  AREA.KHOREZM,
] as const;

export const AREA_LABELS: Record<AreaCode, string> = {
  andijan: 'Andijan Region',
  bukhara: 'Bukhara Region',
  fergana: 'Fergana Region',
  jizzakh: 'Jizzakh Region',
  namangan: 'Namangan Region',
  navoi: 'Navoi Region',
  kashkadarya: 'Kashkadarya Region',
  karakalpakstan: 'Republic of Karakalpakstan',
  samarkand: 'Samarkand Region',
  syrdarya: 'Syrdarya Region',
  surkhandarya: 'Surkhandarya Region',
  tashkent_region: 'Tashkent Region',
  tashkent_city: 'Tashkent City',
  khorezm: 'Khorezm Region',
};

export const APPLICATION_SOURCE_WEB = 'web';

/**
 * Upload limits for wizard documents
 */
export const DOCUMENT_EXTENSIONS = ['.pdf', '.jpg', '.jpeg', '.png', '.doc', '.docx'] as const;
export const MAX_DOCUMENT_SIZE = 5 * 1024 * 1024;
export const MAX_CERTIFICATES = 10;

export const REWARD_IMAGE_MIME_TYPES = ['image/jpeg', 'image/png', 'image/webp'] as const;
export const MAX_REWARD_IMAGE_SIZE = 5 * 1024 * 1024;
