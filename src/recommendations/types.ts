export const RECOMMENDATION_STATUSES = ['PENDING', 'PROCESSING', 'COMPLETED', 'FAILED', 'CANCELLED'] as const;

export type RecommendationStatus = typeof RECOMMENDATION_STATUSES[number];

export interface TaskDescriptor {
  description: string;
  targetMaterial: string;
  targetTemperature?: number;  // °C
  constraints?: Record<string, string>;
  taskId?: string;
}

export interface FormulationComponent {
  name: string;
  role: string;
  function?: string;
}

/**
 * Either a binary formulation (HBA + HBD + molar_ratio) or a component list.
 * Extra keys are kept as-is.
 */
export interface Formulation {
  HBA?: string;
  HBD?: string;
  components?: FormulationComponent[];
  molar_ratio?: string;
  [key: string]: unknown;
}

export interface ExperimentResult {
  isLiquidFormed: boolean;
  solubility: number | null;
  solubilityUnit: string;
  properties: Record<string, unknown>;
  experimenter?: string;
  experimentDate?: string;
  notes?: string;
}

export interface Recommendation {
  id: string;
  task: TaskDescriptor;
  formulation: Formulation;
  reasoning: string | null;
  confidence: number;
  status: RecommendationStatus;
  experimentResult: ExperimentResult | null;
  performanceScore: number | null;
  error: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface RecommendationExtras {
  reasoning?: string;
  createdAt?: Date;
}

/**
 * Listing projection of a recommendation, kept in index.json.
 * Entries written before the derived fields existed lack them.
 */
export interface IndexEntry {
  status: RecommendationStatus;
  targetMaterial: string;
  formulationSummary?: string;
  formulation?: Formulation;
  confidence?: number;
  performanceScore?: number | null;
  createdAt: string;
  updatedAt: string;
}

export interface IndexListing extends IndexEntry {
  id: string;
}

export interface RecommendationFilter {
  status?: RecommendationStatus;
  targetMaterial?: string;
}

export interface RecommendationListOptions extends RecommendationFilter {
  limit?: number;
  offset?: number;
}

export interface StatusPatch {
  error?: string | null;
  experimentResult?: ExperimentResult;
  performanceScore?: number | null;
}

export interface MigrationReport {
  total: number;
  migrated: number;
  skipped: number;
  errors: number;
  failedIds: string[];
  backupPath: string | null;
}
