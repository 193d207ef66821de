import { describeTarget, type CommandResult, type MeshError, type Recipe } from '@recipe-mesh/engine';

export const HELP_TEXT = [
  'Commands:',
  '  ls p                                  list connected peers',
  '  ls r                                  list your recipes',
  '  ls r all                              ask every peer for its recipes',
  '  ls r <peer id>                        ask one peer for its recipes',
  '  ls a                                  list every known recipe',
  '  create r <name>|<ingredients>|<instructions>',
  '                                        create a recipe',
  '  publish r <id>                        publish one of your recipes',
  '  publish r all                         publish all of your recipes',
  '  help                                  show this list',
  '  quit                                  leave the mesh',
].join('\n');

/**
 * Render a recipe as an indented block.
 */
export function formatRecipe(recipe: Recipe): string {
  const lines = [
    `#${recipe.id} ${recipe.name}${recipe.published ? ' (published)' : ''}`,
    `  from: ${recipe.publisherId}`,
  ];
  if (recipe.ingredients) lines.push(`  ingredients: ${recipe.ingredients}`);
  if (recipe.instructions) lines.push(`  instructions: ${recipe.instructions}`);
  return lines.join('\n');
}

function formatRecipes(records: readonly Recipe[], empty: string): string {
  if (records.length === 0) return empty;
  return records.map(formatRecipe).join('\n');
}

export function formatError(error: MeshError): string {
  return `error: ${error.format()}`;
}

/**
 * Render a command result for the terminal.
 */
export function formatResult(result: CommandResult): string {
  if (!result.ok) {
    return formatError(result.error);
  }

  switch (result.kind) {
    case 'created':
      return `Created recipe #${result.record.id} "${result.record.name}"`;
    case 'records':
      return formatRecipes(
        result.records,
        result.scope === 'local' ? 'You have no recipes yet.' : 'No recipes known yet.'
      );
    case 'peers':
      return result.peers.length === 0
        ? 'No peers connected.'
        : [`Peers (${result.peers.length}):`, ...result.peers.map((peer) => `  ${peer}`)].join('\n');
    case 'published':
      return result.records.length === 0
        ? 'Nothing to publish.'
        : `Published ${result.records.length} recipe(s): ${result.records.map((r) => `#${r.id}`).join(', ')}`;
    case 'requested':
      return `Requested recipes from ${describeTarget(result.target)}`;
  }
}
