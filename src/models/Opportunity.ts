/**
 * SAM.gov opportunity models
 */

/**
 * A listing as returned by the opportunities search, reduced to the fields
 * the pipeline uses. noticeId is '' when the source omits it.
 */
export interface RawOpportunity {
  noticeId: string;
  title: string;
  solicitationNumber: string;
  naicsCode: string;
  type: string;
  responseDeadLine: string;
}

export interface OpportunitySearch {
  description: string;
  params: Record<string, string>;
}
