import { beforeEach, describe, it, expect, vi } from "vitest";

const { create, post } = vi.hoisted(() => ({ create: vi.fn(), post: vi.fn() }));

vi.mock("axios", () => ({
  default: {
    create,
    isAxiosError: (err: unknown) =>
      typeof err === "object" && err !== null && "isAxiosError" in err,
  },
}));

import { LinearClient } from "../src/adapters/linear/LinearClient";

const config = {
  apiUrl: "https://linear.test/graphql",
  apiKey: "test-key",
  pageSize: 50,
};

beforeEach(() => {
  create.mockReset();
  post.mockReset();
  create.mockReturnValue({ post });
});

describe("LinearClient", () => {
  it("sends the API key as the Authorization header", () => {
    new LinearClient(config);

    expect(create).toHaveBeenCalledWith({
      baseURL: "https://linear.test/graphql",
      headers: {
        Authorization: "test-key",
        "Content-Type": "application/json",
      },
    });
  });

  it("requests a page of issues scoped to a team", async () => {
    const page = {
      nodes: [{ id: "lin-1", identifier: "ENG-1", title: "One", description: null, parent: null }],
      pageInfo: { hasNextPage: false, endCursor: null },
    };
    post.mockResolvedValue({ data: { data: { issues: page } } });

    const result = await new LinearClient(config).fetchIssuesPage("cursor-1", "ENG");

    expect(result).toEqual(page);
    expect(post).toHaveBeenCalledWith("", {
      query: expect.stringContaining("issues(filter: $filter, first: $first, after: $after)"),
      variables: {
        filter: { team: { key: { eq: "ENG" } } },
        first: 50,
        after: "cursor-1",
      },
    });
  });

  it("leaves the filter out without a team", async () => {
    post.mockResolvedValue({
      data: { data: { issues: { nodes: [], pageInfo: { hasNextPage: false } } } },
    });

    await new LinearClient(config).fetchIssuesPage();

    expect(post.mock.calls[0][1].variables).toEqual({
      filter: undefined,
      first: 50,
      after: undefined,
    });
  });

  it("sends the issueUpdate mutation with the parent id", async () => {
    const payload = {
      success: true,
      issue: { id: "lin-2", identifier: "ENG-2", parent: { identifier: "ENG-1" } },
    };
    post.mockResolvedValue({ data: { data: { issueUpdate: payload } } });

    const result = await new LinearClient(config).updateIssueParent("lin-2", "lin-1");

    expect(result).toEqual(payload);
    expect(post).toHaveBeenCalledWith("", {
      query: expect.stringContaining("issueUpdate(id: $issueId, input: { parentId: $parentId })"),
      variables: { issueId: "lin-2", parentId: "lin-1" },
    });
  });

  it("throws on GraphQL errors", async () => {
    post.mockResolvedValue({ data: { errors: [{ message: "Rate limited" }] } });

    await expect(
      new LinearClient(config).updateIssueParent("lin-2", "lin-1")
    ).rejects.toThrow('GraphQL errors: [{"message":"Rate limited"}]');
  });

  it("reports the HTTP status and GraphQL errors of a failed request", async () => {
    post.mockRejectedValue({
      isAxiosError: true,
      message: "Request failed with status code 400",
      response: { status: 400, data: { errors: [{ message: "Argument Validation Error" }] } },
      config: { headers: { Authorization: "test-key" } },
    });

    await expect(
      new LinearClient(config).updateIssueParent("lin-2", "lin-1")
    ).rejects.toThrow(
      'Linear API request failed (400): [{"message":"Argument Validation Error"}]'
    );
  });

  it("propagates other failures unchanged", async () => {
    post.mockRejectedValue(new Error("Request failed with status code 401"));

    await expect(new LinearClient(config).fetchIssuesPage()).rejects.toThrow(
      "Request failed with status code 401"
    );
  });
});
