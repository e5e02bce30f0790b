/**
 * Asset Engine Types
 * Shared between the engine and whatever presentation layer hosts it
 */

// Asset kinds produced by the generation pipeline
export type AssetKind = 'image' | 'model' | 'textured-model';

export interface Asset {
  /** Absolute path, unique key in the tracker */
  path: string;
  kind: AssetKind;
  /** File mtime in epoch milliseconds */
  modifiedAt: number;
}

// Raw watcher notification types
export type WatchEventType = 'add' | 'change' | 'unlink';

export interface WatchEvent {
  type: WatchEventType;
  path: string;
}

export interface DiscoveryEvent {
  path: string;
  kind: AssetKind;
  modifiedAt: number;
}

export interface DiscoveryOutcome {
  asset: Asset;
  isNew: boolean;
  isSessionAsset: boolean;
}

// Progression of one creative lineage, forward-only
export type ProgressionStage = 'image-only' | 'has-model' | 'textured';

export interface UnifiedObject {
  /** Most-derived known path for the lineage */
  key: string;
  stage: ProgressionStage;
  image: string | null;
  model: string | null;
  textured: string | null;
}

export type SelectionSummary = Record<ProgressionStage, number>;

export interface Association {
  imagePath: string;
  modelPath: string;
}

export interface AssociationStats {
  totalAssociations: number;
  selectedImages: number;
  selectedModels: number;
  imagesWithModels: number;
}

// View definitions for the lazy loader
export type ViewScope = 'all' | 'session';

export interface ViewDefinition {
  name: string;
  directory: string;
  kind: AssetKind;
  patterns: string[];
  recursive: boolean;
  scope: ViewScope;
}

export interface ViewCache {
  loaded: boolean;
  assets: Asset[];
}

export interface ScannedFile {
  path: string;
  modifiedAt: number;
  size: number;
}

// Preview admission
export interface ResourceHandle {
  id: string;
  sessionScoped: boolean;
  acquiredAt: number;
}

export interface ResourcePoolStats {
  active: number;
  session: number;
  historical: number;
  totalQuota: number;
  sessionQuota: number;
}

// Persisted document, written in full on every mutation
export interface PersistedState {
  associations: Record<string, string>;
  selection: Record<string, boolean>;
  textured: Record<string, string>;
}

// Callbacks exposed to presentation
export interface EngineListeners {
  onAssetDiscovered(asset: Asset, isSessionScoped: boolean): void;
  onAssetRemoved(path: string): void;
  onSelectionChanged(objects: readonly UnifiedObject[]): void;
  onAssociationChanged(image: string, model: string | null): void;
}
