import type { AssetTypeKey } from './types.js';

export interface AssetTypeDefinition {
  key: AssetTypeKey;
  label: string;
  /** Folder created for the asset inside a course directory */
  folderName: string;
  /** Other folder names that identify the same asset on disk */
  aliases: string[];
}

/**
 * The six asset categories, in transfer order
 */
export const ASSET_TYPES: readonly AssetTypeDefinition[] = [
  { key: 'course-outline', label: 'Course Outline', folderName: 'Course Outline', aliases: ['Outline', 'Syllabus'] },
  { key: 'slides', label: 'PPTs', folderName: 'PPTs', aliases: ['Slides', 'PPT', 'Presentations'] },
  { key: 'written-assets', label: 'Written Assets', folderName: 'Written Assets', aliases: ['Written', 'Quizzes'] },
  { key: 'final-videos', label: 'Final Videos', folderName: 'Final Videos', aliases: ['Final', 'Videos'] },
  { key: 'raw-videos', label: 'Raw Videos', folderName: 'Raw Videos', aliases: ['Raw', 'Footage', 'Rushes'] },
  { key: 'course-artifacts', label: 'Course Artifacts', folderName: 'Course Artifacts', aliases: ['Artifacts', 'Production'] },
];

export const ASSET_TYPE_KEYS: readonly AssetTypeKey[] = ASSET_TYPES.map(type => type.key);

export function getAssetType(key: AssetTypeKey): AssetTypeDefinition {
  const definition = ASSET_TYPES.find(type => type.key === key);
  if (!definition) {
    throw new Error(`Unknown asset type: ${key}`);
  }
  return definition;
}
