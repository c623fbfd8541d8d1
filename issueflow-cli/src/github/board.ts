/**
 * GitHub Projects (v2) board operations over GraphQL
 */

import { z } from 'zod';
import { parseResponse, type ApiClient } from './client.js';
import { logger } from '../utils/logger.js';
import { GitHubError, ErrorCode } from '../utils/errors.js';

export type BoardContentType = 'Issue' | 'PullRequest' | 'DraftIssue';

export interface BoardItem {
  itemId: string;
  /** null for draft issues, which have no number */
  issueNumber: number | null;
  contentType: BoardContentType;
  /** Field name → option name (single select) or number rendered as text */
  fieldValues: Record<string, string>;
  /** Same values keyed by field id */
  fieldValuesById: Record<string, string>;
}

/**
 * Result of scanning the board for an issue. There is no index from issue
 * number to board item, so `scanned` says how many items were looked at.
 */
export type BoardLookup =
  | { found: true; item: BoardItem }
  | { found: false; scanned: number };

export interface ProjectFieldOption {
  id: string;
  name: string;
}

export interface ProjectField {
  id: string;
  name: string;
  dataType: string;
  options: ProjectFieldOption[];
}

export interface RepositoryProject {
  id: string;
  title: string;
  number: number;
  fields: ProjectField[];
}

export interface BoardManager {
  /** First 100 board items. */
  listItems(): Promise<BoardItem[]>;
  /** O(n) scan over `listItems()` for the item whose content has `issueNumber`. */
  findItemByIssueNumber(issueNumber: number): Promise<BoardLookup>;
  /** The item's value for `fieldId`, or null when unset or not on the board. */
  getItemFieldValue(issueNumber: number, fieldId: string): Promise<string | null>;
  addItem(contentId: string): Promise<string>;
  /** Returns the option name the field holds after the update, when GitHub reports it. */
  setSingleSelect(itemId: string, fieldId: string, optionId: string): Promise<string | null>;
  setNumber(itemId: string, fieldId: string, value: number): Promise<void>;
  listRepositoryProjects(repositoryNodeId: string): Promise<RepositoryProject[]>;
}

export const ITEMS_QUERY = `query($projectId: ID!) {
  node(id: $projectId) {
    ... on ProjectV2 {
      items(first: 100) {
        nodes {
          id
          content {
            __typename
            ... on Issue { number }
            ... on PullRequest { number }
          }
          fieldValues(first: 20) {
            nodes {
              ... on ProjectV2ItemFieldSingleSelectValue {
                name
                field { ... on ProjectV2SingleSelectField { id name } }
              }
              ... on ProjectV2ItemFieldNumberValue {
                number
                field { ... on ProjectV2Field { id name } }
              }
            }
          }
        }
      }
    }
  }
}`;

export const ADD_ITEM_MUTATION = `mutation($projectId: ID!, $contentId: ID!) {
  addProjectV2ItemById(input: { projectId: $projectId, contentId: $contentId }) {
    item { id }
  }
}`;

export const UPDATE_FIELD_MUTATION = `mutation($projectId: ID!, $itemId: ID!, $fieldId: ID!, $value: ProjectV2FieldValue!) {
  updateProjectV2ItemFieldValue(input: { projectId: $projectId, itemId: $itemId, fieldId: $fieldId, value: $value }) {
    projectV2Item {
      id
      fieldValues(first: 20) {
        nodes {
          ... on ProjectV2ItemFieldSingleSelectValue {
            name
            field { ... on ProjectV2SingleSelectField { id name } }
          }
        }
      }
    }
  }
}`;

export const REPOSITORY_PROJECTS_QUERY = `query($repositoryId: ID!) {
  node(id: $repositoryId) {
    ... on Repository {
      projectsV2(first: 20) {
        nodes {
          id
          title
          number
          fields(first: 20) {
            nodes {
              ... on ProjectV2SingleSelectField { id name dataType options { id name } }
              ... on ProjectV2Field { id name dataType }
            }
          }
        }
      }
    }
  }
}`;

const fieldRefSchema = z.object({ id: z.string().optional(), name: z.string().optional() });

const fieldValueSchema = z.object({
  name: z.string().nullable().optional(),
  number: z.number().nullable().optional(),
  field: fieldRefSchema.optional(),
});

const itemSchema = z.object({
  id: z.string(),
  content: z
    .object({
      __typename: z.string().optional(),
      number: z.number().optional(),
    })
    .nullable()
    .optional(),
  fieldValues: z.object({ nodes: z.array(fieldValueSchema.nullable()) }).optional(),
});

const itemsResponseSchema = z.object({
  node: z
    .object({
      items: z.object({ nodes: z.array(itemSchema.nullable()) }).optional(),
    })
    .nullable(),
});

const addItemResponseSchema = z.object({
  addProjectV2ItemById: z.object({ item: z.object({ id: z.string() }) }),
});

const updateResponseSchema = z.object({
  updateProjectV2ItemFieldValue: z.object({
    projectV2Item: z.object({
      id: z.string(),
      fieldValues: z.object({ nodes: z.array(fieldValueSchema.nullable()) }).optional(),
    }),
  }),
});

const projectsResponseSchema = z.object({
  node: z
    .object({
      projectsV2: z
        .object({
          nodes: z.array(
            z
              .object({
                id: z.string(),
                title: z.string(),
                number: z.number(),
                fields: z.object({
                  nodes: z.array(
                    z
                      .object({
                        id: z.string().optional(),
                        name: z.string().optional(),
                        dataType: z.string().optional(),
                        options: z.array(z.object({ id: z.string(), name: z.string() })).optional(),
                      })
                      .nullable()
                  ),
                }),
              })
              .nullable()
          ),
        })
        .optional(),
    })
    .nullable(),
});

function toContentType(typename: string | undefined): BoardContentType {
  if (typename === 'PullRequest') return 'PullRequest';
  if (typename === 'DraftIssue') return 'DraftIssue';
  return 'Issue';
}

function collectFieldValues(
  nodes: Array<z.output<typeof fieldValueSchema> | null>
): Pick<BoardItem, 'fieldValues' | 'fieldValuesById'> {
  const fieldValues: Record<string, string> = {};
  const fieldValuesById: Record<string, string> = {};

  for (const node of nodes) {
    if (!node?.field) continue;
    const value = typeof node.name === 'string' ? node.name : typeof node.number === 'number' ? String(node.number) : undefined;
    if (value === undefined) continue;
    if (node.field.name) fieldValues[node.field.name] = value;
    if (node.field.id) fieldValuesById[node.field.id] = value;
  }

  return { fieldValues, fieldValuesById };
}

export function createBoardManager(client: ApiClient, projectId: string): BoardManager {
  const log = logger.child('Board');

  const updateField = async (itemId: string, fieldId: string, value: Record<string, unknown>) => {
    const data = await client.graphql(UPDATE_FIELD_MUTATION, { projectId, itemId, fieldId, value });
    return parseResponse(updateResponseSchema, data, 'updateProjectV2ItemFieldValue');
  };

  const manager: BoardManager = {
    async listItems(): Promise<BoardItem[]> {
      const data = await client.graphql(ITEMS_QUERY, { projectId });
      const response = parseResponse(itemsResponseSchema, data, 'project items');

      if (!response.node?.items) {
        throw new GitHubError(ErrorCode.GITHUB_NOT_FOUND, `Project ${projectId} not found or not a Projects (v2) board`, {
          endpoint: 'project items',
          context: { projectId },
        });
      }

      const items: BoardItem[] = [];
      for (const node of response.node.items.nodes) {
        if (!node) continue;
        items.push({
          itemId: node.id,
          issueNumber: node.content?.number ?? null,
          contentType: toContentType(node.content?.__typename),
          ...collectFieldValues(node.fieldValues?.nodes ?? []),
        });
      }
      return items;
    },

    async findItemByIssueNumber(issueNumber: number): Promise<BoardLookup> {
      const items = await manager.listItems();
      const item = items.find((candidate) => candidate.issueNumber === issueNumber);
      log.debug(`Scanned ${items.length} board items for #${issueNumber}`, { found: item !== undefined });
      return item ? { found: true, item } : { found: false, scanned: items.length };
    },

    async getItemFieldValue(issueNumber: number, fieldId: string): Promise<string | null> {
      const lookup = await manager.findItemByIssueNumber(issueNumber);
      if (!lookup.found) return null;
      return lookup.item.fieldValuesById[fieldId] ?? null;
    },

    async addItem(contentId: string): Promise<string> {
      const data = await client.graphql(ADD_ITEM_MUTATION, { projectId, contentId });
      return parseResponse(addItemResponseSchema, data, 'addProjectV2ItemById').addProjectV2ItemById.item.id;
    },

    async setSingleSelect(itemId: string, fieldId: string, optionId: string): Promise<string | null> {
      const response = await updateField(itemId, fieldId, { singleSelectOptionId: optionId });
      const nodes = response.updateProjectV2ItemFieldValue.projectV2Item.fieldValues?.nodes ?? [];
      return collectFieldValues(nodes).fieldValuesById[fieldId] ?? null;
    },

    async setNumber(itemId: string, fieldId: string, value: number): Promise<void> {
      await updateField(itemId, fieldId, { number: value });
    },

    async listRepositoryProjects(repositoryNodeId: string): Promise<RepositoryProject[]> {
      const data = await client.graphql(REPOSITORY_PROJECTS_QUERY, { repositoryId: repositoryNodeId });
      const response = parseResponse(projectsResponseSchema, data, 'repository projects');
      const projects: RepositoryProject[] = [];

      for (const project of response.node?.projectsV2?.nodes ?? []) {
        if (!project) continue;
        const fields: ProjectField[] = [];
        for (const field of project.fields.nodes) {
          if (!field?.id || !field.name) continue;
          fields.push({
            id: field.id,
            name: field.name,
            dataType: field.dataType ?? 'UNKNOWN',
            options: field.options ?? [],
          });
        }
        projects.push({ id: project.id, title: project.title, number: project.number, fields });
      }

      return projects;
    },
  };

  return manager;
}
