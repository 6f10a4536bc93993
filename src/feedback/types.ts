export interface ExperimentResultInput {
  isLiquidFormed: boolean;
  solubility?: number | null;
  solubilityUnit?: string;
  properties?: Record<string, unknown>;
  experimenter?: string;
  experimentDate?: string;
  notes?: string;
}

export interface SubmitOptions {
  async?: boolean;
}

export interface FeedbackAccepted {
  status: 'accepted';
  recommendationId: string;
  isUpdate: boolean;
}

export interface FeedbackCompleted {
  status: 'completed';
  recommendationId: string;
  performanceScore: number;
  memoriesExtracted: string[];   // Titles of the memories written
  numMemories: number;
  isUpdate: boolean;
  deletedMemories: number;
  warnings: string[];
}

export interface FeedbackFailed {
  status: 'failed';
  recommendationId: string;
  isUpdate: boolean;
  error: string;
}

export type FeedbackOutcome = FeedbackCompleted | FeedbackFailed;

export type ProcessingState = 'processing' | 'completed' | 'failed';

export interface ProcessingResult {
  performanceScore: number;
  memoriesExtracted: string[];
  numMemories: number;
  isUpdate: boolean;
  deletedMemories: number;
}

/**
 * Entry in the in-process status map, read by checkStatus
 */
export interface ProcessingStatus {
  status: ProcessingState;
  startedAt: string;
  completedAt?: string;
  failedAt?: string;
  result?: ProcessingResult;
  error?: string;
}
