import { ConsistencyLevel, DiscreteScore, RowIssue, StrategyKind } from "./consistency/schema";
import { ScoreSummary } from "./consistency/summary";

export type JobStatus = "queued" | "processing" | "completed" | "failed";

export interface EvalQueued {
    id: string;
    status: Extract<JobStatus, "queued">;
}

interface EvaluationRowBase {
    id: string;
    objective_id: string | null;
    objective_text: string;
    activity_text: string;
    detail_text: string;
    year: string | null;
}

export interface RankingEvaluationRow extends EvaluationRowBase {
    strategy: Extract<StrategyKind, "similarity-ranking">;
    consistency_score: DiscreteScore;
    best_matching_objective_id: string | null;
    similarity_to_chosen: number;
    similarity_to_best: number;
    rank_of_chosen: number | null; // 1 = best match
    issue: RowIssue | null;
}

export interface KeywordEvaluationRow extends EvaluationRowBase {
    strategy: Extract<StrategyKind, "keyword-groups">;
    consistency_score: number; // 0..100, one decimal
    level: ConsistencyLevel;
    category: string;
    semantic: number;
    thematic: number;
    operational: number;
}

export type EvaluationRow = RankingEvaluationRow | KeywordEvaluationRow;

export interface EvalResult {
    strategy: StrategyKind;
    rows: EvaluationRow[];
    summary: ScoreSummary;
}

export interface CompletedStatus {
    id: string;
    status: Extract<JobStatus, "completed">;
    result: EvalResult;
}
