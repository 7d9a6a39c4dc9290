import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { BranchMapping, BranchMappingTableInfo } from '../types.js';
import { jsonResult, toolOperation, withSession, type ToolContext } from '../utils.js';

export const sessionTreeTools = {
  put_branch_mapping_table: {
    description:
      'Creates or replaces the branch mapping table of a session tree branch. Mappings are tried in order and the ' +
      'first whose session filter matches decides which topic tree branch a session sees. ' +
      'Needs MODIFY_TOPIC permission for the session tree branch and EXPOSE_BRANCH for each mapped branch. ' +
      "See the 'session_trees' context.",
  },
  get_branch_mapping_table: {
    description:
      'Retrieves the branch mapping table of a session tree branch; the table is empty when the branch has no mappings. ' +
      'Needs READ_TOPIC permission for the session tree branch.',
  },
  list_session_tree_branches: {
    description: 'Lists the session tree branches that have branch mapping tables, in path order.',
  },
  remove_branch_mapping_table: {
    description:
      'Removes the branch mapping table of a session tree branch, so sessions see the topic paths unchanged. ' +
      'Needs EXPOSE_BRANCH permission for each branch of the existing table.',
  },
};

function tablePayload(table: BranchMappingTableInfo, status: string) {
  return {
    sessionTreeBranch: table.sessionTreeBranch,
    mappingCount: table.mappings.length,
    branchMappings: table.mappings,
    status,
  };
}

export async function handlePutBranchMappingTable(
  ctx: ToolContext,
  callerId: string,
  args: { sessionTreeBranch: string; branchMappings: BranchMapping[] }
): Promise<CallToolResult> {
  const table: BranchMappingTableInfo = {
    sessionTreeBranch: args.sessionTreeBranch.trim(),
    mappings: args.branchMappings.map((mapping) => ({
      sessionFilter: mapping.sessionFilter.trim(),
      topicTreeBranch: mapping.topicTreeBranch.trim(),
    })),
  };
  return withSession(ctx, callerId, toolOperation('put_branch_mapping_table', table.sessionTreeBranch), async (session) => {
    await session.sessionTreesApi().putTable(table);
    ctx.logger.info('branch_mapping_table_put', { sessionTreeBranch: table.sessionTreeBranch, mappings: table.mappings.length });
    return jsonResult(tablePayload(table, 'created'));
  });
}

export async function handleGetBranchMappingTable(
  ctx: ToolContext,
  callerId: string,
  args: { sessionTreeBranch: string }
): Promise<CallToolResult> {
  const branch = args.sessionTreeBranch.trim();
  return withSession(ctx, callerId, toolOperation('get_branch_mapping_table', branch), async (session) => {
    const table = await session.sessionTreesApi().getTable(branch);
    return jsonResult(tablePayload(table, 'retrieved'));
  });
}

export async function handleListSessionTreeBranches(ctx: ToolContext, callerId: string): Promise<CallToolResult> {
  return withSession(ctx, callerId, 'list_session_tree_branches', async (session) => {
    const branches = await session.sessionTreesApi().listBranches();
    return jsonResult({ sessionTreeBranches: branches, branchCount: branches.length, status: 'listed' });
  });
}

export async function handleRemoveBranchMappingTable(
  ctx: ToolContext,
  callerId: string,
  args: { sessionTreeBranch: string }
): Promise<CallToolResult> {
  const branch = args.sessionTreeBranch.trim();
  return withSession(ctx, callerId, toolOperation('remove_branch_mapping_table', branch), async (session) => {
    // An empty table replaces, and so removes, the existing one.
    const table: BranchMappingTableInfo = { sessionTreeBranch: branch, mappings: [] };
    await session.sessionTreesApi().putTable(table);
    ctx.logger.info('branch_mapping_table_removed', { sessionTreeBranch: branch });
    return jsonResult(tablePayload(table, 'removed'));
  });
}
