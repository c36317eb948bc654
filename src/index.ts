// file: src/index.ts
import process from 'node:process';
import chalk from 'chalk';
import minimist, { type ParsedArgs } from 'minimist';
import { Env } from './config/env';
import { MemoryGraphStore } from './db/memory_store';
import { InvalidRequestError, isKnowledgeGraphError } from './errors';
import { isNodeLabel, isRelationshipType } from './graph/schema';
import { KnowledgeGraphRetriever } from './retrieval/retriever';

const USAGE = [
  'Użycie: npm run kg -- <komenda> [argumenty] [--graph plik.json] [--no-color]',
  '  search [--name X] [--label Level|Topic|Subtopic] [--difficulty D] [--limit N]',
  '  node <nazwa>',
  '  context <nazwa> [--depth N]',
  '  related <nazwa> [--type RELACJA]',
  '  topic <nazwa>',
  '  prereqs <nazwa>',
  '  dependents <nazwa>',
  '  path <start> <cel> [--max-depth N]',
  '  similar <nazwa>',
  '  levels',
].join('\n');

type Outcome = { result: unknown; found: boolean };

function intFlag(v: unknown, fallback?: number): number | undefined {
  if (v === undefined || v === '') return fallback;
  return Number(v);
}

function optionalString(v: unknown): string | undefined {
  return v === undefined || v === null || v === '' ? undefined : String(v);
}

function requireName(rest: string[], command: string): string {
  const name = rest.join(' ').trim();
  if (!name) throw new InvalidRequestError(`"${command}" wymaga nazwy węzła`);
  return name;
}

async function openRetriever(graphFile: string | undefined): Promise<KnowledgeGraphRetriever> {
  if (!graphFile) return KnowledgeGraphRetriever.fromEnv();
  const store = new MemoryGraphStore({ file: graphFile }, { queryTimeoutMs: Env.queryTimeoutMs });
  await store.connect();
  return new KnowledgeGraphRetriever(store);
}

async function dispatch(
  kg: KnowledgeGraphRetriever,
  command: string,
  rest: string[],
  args: ParsedArgs,
): Promise<Outcome> {
  switch (command) {
    case 'search': {
      const label = optionalString(args.label);
      if (label !== undefined && !isNodeLabel(label)) throw new InvalidRequestError(`Nieznana etykieta: ${label}`);
      const result = await kg.search({
        name: optionalString(args.name) ?? (rest.join(' ').trim() || undefined),
        label,
        difficulty: optionalString(args.difficulty),
        limit: intFlag(args.limit),
      });
      return { result, found: true };
    }
    case 'node': {
      const result = await kg.getNodeDetails(requireName(rest, command));
      return { result, found: result.node !== null };
    }
    case 'context': {
      const result = await kg.getContext(requireName(rest, command), intFlag(args.depth));
      return { result, found: result.node !== null };
    }
    case 'related': {
      const type = optionalString(args.type);
      if (type !== undefined && !isRelationshipType(type)) throw new InvalidRequestError(`Nieznany typ relacji: ${type}`);
      const result = await kg.getRelatedNodes(requireName(rest, command), type);
      return { result, found: result.node !== null };
    }
    case 'topic': {
      const result = await kg.getTopicWithSubtopics(requireName(rest, command));
      return { result, found: result.topic !== null };
    }
    case 'prereqs': {
      const result = await kg.getPrerequisites(requireName(rest, command));
      return { result, found: result.node !== null };
    }
    case 'dependents': {
      const result = await kg.getDependents(requireName(rest, command));
      return { result, found: result.node !== null };
    }
    case 'path': {
      if (rest.length !== 2) throw new InvalidRequestError('"path" wymaga dwóch nazw: <start> <cel> (w cudzysłowach, jeśli ze spacjami)');
      const result = await kg.getLearningPath(rest[0], rest[1], intFlag(args['max-depth']));
      return { result, found: result.status !== 'not_found' };
    }
    case 'similar': {
      const result = await kg.similarByDifficulty(requireName(rest, command));
      return { result, found: result.node !== null };
    }
    case 'levels':
      return { result: await kg.getAllLevels(), found: true };
    default:
      throw new InvalidRequestError(`Nieznana komenda: ${command}\n${USAGE}`);
  }
}

async function main() {
  const args = minimist(process.argv.slice(2), {
    string: ['name', 'label', 'difficulty', 'type', 'graph'],
    boolean: ['color'],
    default: { color: true },
  });
  if (args.color === false || Env.noColor) chalk.level = 0;

  const [command, ...rest] = args._.map(String);
  if (!command) {
    console.error(chalk.red(`❌ Podaj komendę.\n${USAGE}`));
    process.exit(1);
  }

  console.error(chalk.bold(`[BOOT] kg ${command} pid=${process.pid} node=${process.version}`));

  const kg = await openRetriever(optionalString(args.graph));
  try {
    const { result, found } = await dispatch(kg, command, rest, args);
    console.log(JSON.stringify(result, null, 2));
    if (!found) {
      console.error(chalk.yellow('⚠️  Nie znaleziono węzła.'));
      process.exitCode = 2;
    }
  } finally {
    await kg.close();
  }
}

main().catch((e: unknown) => {
  const kind = isKnowledgeGraphError(e) ? e.name : 'Error';
  console.error(chalk.red(`💥 ${kind}:`), e instanceof Error ? e.message : e);
  if (e instanceof Error && e.stack && Env.logLevel === 'debug') console.error(chalk.gray(e.stack));
  process.exit(1);
});
