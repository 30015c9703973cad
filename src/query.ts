import type { AppConfig } from "./config.js";

const REFERER = "https://www.upwork.com/nx/find-work/most-recent";
const USER_AGENT = "UpworkFetcher/1.0";

export const MOST_RECENT_JOBS_FEED_QUERY = `query($limit: Int, $toTime: String) {
  mostRecentJobsFeed(limit: $limit, toTime: $toTime) {
    results {
      id,
      uid:id
      title,
      ciphertext,
      description,
      type,
      recno,
      freelancersToHire,
      duration,
      engagement,
      amount {
        amount,
      },
      createdOn:createdDateTime,
      publishedOn:publishedDateTime,
      prefFreelancerLocationMandatory,
      connectPrice,
      client {
        totalHires
        totalSpent
        paymentVerificationStatus,
        location {
          country,
        },
        totalReviews
        totalFeedback,
        hasFinancialPrivacy
      },
      tierText
      tier
      tierLabel
      proposalsTier
      enterpriseJob
      premium,
      jobTs:jobTime,
      attrs:skills {
        id,
        uid:id,
        prettyName:prefLabel
        prefLabel
      }
      hourlyBudget {
        type
        min
        max
      }
      isApplied
    },
    paging {
      total,
      count,
      resultSetTs:minTime,
      maxTime
    }
  }
}`;

export interface JobsFeedRequest {
  query: string;
  variables: { limit: number };
}

export function buildJobsFeedRequest(limit: number): JobsFeedRequest {
  return { query: MOST_RECENT_JOBS_FEED_QUERY, variables: { limit } };
}

export function buildRequestHeaders(upwork: AppConfig["upwork"]): Record<string, string> {
  return {
    Authorization: `Bearer ${upwork.token}`,
    "Content-Type": "application/json",
    "x-upwork-api-tenantid": upwork.tenantId,
    Referer: REFERER,
    Accept: "*/*",
    "User-Agent": USER_AGENT,
  };
}
