/**
 * Pipeline Stage Value Object
 *
 * Stage Transitions:
 * ADMITTED → AUTHENTICATING → PATH_DECODING → URL_VALIDATING → FETCHING
 *   → CACHE_CHECKING → TRANSFORMING → RESPONDING (200)
 * CACHE_CHECKING → RESPONDING (304)
 * any stage → RESPONDING (error)
 */
export enum PipelineStage {
  ADMITTED = 'Admitted',
  AUTHENTICATING = 'Authenticating',
  PATH_DECODING = 'PathDecoding',
  URL_VALIDATING = 'URLValidating',
  FETCHING = 'Fetching',
  CACHE_CHECKING = 'CacheChecking',
  TRANSFORMING = 'Transforming',
  RESPONDING = 'Responding',
}

const TRANSITIONS: Record<PipelineStage, PipelineStage[]> = {
  [PipelineStage.ADMITTED]: [PipelineStage.AUTHENTICATING],
  [PipelineStage.AUTHENTICATING]: [PipelineStage.PATH_DECODING, PipelineStage.RESPONDING],
  [PipelineStage.PATH_DECODING]: [PipelineStage.URL_VALIDATING, PipelineStage.RESPONDING],
  [PipelineStage.URL_VALIDATING]: [PipelineStage.FETCHING, PipelineStage.RESPONDING],
  [PipelineStage.FETCHING]: [PipelineStage.CACHE_CHECKING, PipelineStage.RESPONDING],
  [PipelineStage.CACHE_CHECKING]: [PipelineStage.TRANSFORMING, PipelineStage.RESPONDING],
  [PipelineStage.TRANSFORMING]: [PipelineStage.RESPONDING],
  [PipelineStage.RESPONDING]: [],
};

export function canTransition(from: PipelineStage, to: PipelineStage): boolean {
  return TRANSITIONS[from].includes(to);
}
