import axios, { type AxiosInstance } from "axios";
import type { LinearConfig } from "../../domain/models/ConfigModels";
import type {
  LinearIssuePage,
  LinearIssueUpdatePayload,
} from "../../domain/models/LinearModels";

interface GraphQLResponse<T> {
  data?: T;
  errors?: unknown[];
}

const ISSUES_QUERY = `
  query Issues($filter: IssueFilter, $first: Int!, $after: String) {
    issues(filter: $filter, first: $first, after: $after) {
      nodes {
        id
        identifier
        title
        description
        parent {
          id
          identifier
        }
      }
      pageInfo {
        hasNextPage
        endCursor
      }
    }
  }
`;

const UPDATE_PARENT_MUTATION = `
  mutation UpdateIssue($issueId: String!, $parentId: String!) {
    issueUpdate(id: $issueId, input: { parentId: $parentId }) {
      success
      issue {
        id
        identifier
        parent {
          identifier
        }
      }
    }
  }
`;

export class LinearClient {
  private client: AxiosInstance;

  constructor(private config: LinearConfig) {
    this.client = axios.create({
      baseURL: config.apiUrl,
      headers: {
        Authorization: config.apiKey,
        "Content-Type": "application/json",
      },
    });
  }

  private async post<T>(body: Record<string, unknown>) {
    try {
      return await this.client.post<GraphQLResponse<T>>("", body);
    } catch (err) {
      if (!axios.isAxiosError<GraphQLResponse<T>>(err)) throw err;
      // An AxiosError carries the request config, Authorization header included.
      const status = err.response?.status;
      const errors = err.response?.data?.errors;
      const detail =
        errors && errors.length > 0 ? JSON.stringify(errors) : err.code ?? err.message;
      throw new Error(
        status
          ? `Linear API request failed (${status}): ${detail}`
          : `Linear API request failed: ${detail}`
      );
    }
  }

  async request<T>(query: string, variables?: Record<string, unknown>): Promise<T> {
    const res = await this.post<T>({
      query,
      ...(variables ? { variables } : {}),
    });
    if (res.data.errors && res.data.errors.length > 0) {
      throw new Error(`GraphQL errors: ${JSON.stringify(res.data.errors)}`);
    }
    if (!res.data.data) {
      throw new Error("GraphQL response carried no data");
    }
    return res.data.data;
  }

  async fetchIssuesPage(after?: string, teamKey?: string): Promise<LinearIssuePage> {
    const data = await this.request<{ issues: LinearIssuePage }>(ISSUES_QUERY, {
      filter: teamKey ? { team: { key: { eq: teamKey } } } : undefined,
      first: this.config.pageSize,
      after,
    });
    return data.issues;
  }

  async updateIssueParent(
    issueId: string,
    parentId: string
  ): Promise<LinearIssueUpdatePayload> {
    const data = await this.request<{ issueUpdate: LinearIssueUpdatePayload }>(
      UPDATE_PARENT_MUTATION,
      { issueId, parentId }
    );
    return data.issueUpdate;
  }
}
