export { submitResult, SubmitResultContext } from './submit-result.use-case';
export { confirmResult, ConfirmResultContext } from './confirm-result.use-case';
export { disputeResult, DisputeResultContext } from './dispute-result.use-case';
export { reopenMatch, forceConfirm, ResolveDisputeContext } from './resolve-dispute.use-case';
export { ResultContext, resultException } from './result-helpers';
