#!/usr/bin/env tsx
import "dotenv/config";
import { Command, InvalidArgumentError } from 'commander'
import { input, select } from '@inquirer/prompts';
import chalk from 'chalk'
import ora from 'ora'
import { loadConfig, type AppConfig } from './config';
import { createLogger, type Logger } from './logger';
import { createCorpusSource, createEmbedder, createLLM, startSimilarity, type SimilarityRuntime } from './bootstrap';
import { SimilarityHandler, type SimilarityOutcome } from './core/similarity-handler';
import { ValidationHandler } from './core/validation-handler';
import { RefinementHandler } from './core/refinement-handler';
import { classifyReply } from './core/conversation';

const program = new Command()

function parseThreshold(value: string): number {
    const threshold = Number(value);
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
        throw new InvalidArgumentError('Threshold must be a number between 0 and 1.');
    }
    return threshold;
}

function parseTopK(value: string): number {
    const topK = Number(value);
    if (!Number.isInteger(topK) || topK <= 0) {
        throw new InvalidArgumentError('Top-k must be a positive integer.');
    }
    return topK;
}

function setup(): { config: AppConfig; logger: Logger } {
    const config = loadConfig();
    return { config, logger: createLogger(config.logLevel) };
}

async function buildRuntime(config: AppConfig, logger: Logger): Promise<SimilarityRuntime> {
    const spinner = ora('📚 Building the question index...\n').start();
    try {
        const runtime = await startSimilarity(createCorpusSource(config, logger), createEmbedder(config, logger), logger);
        spinner.succeed(`Indexed ${runtime.engine.size} questions`);
        return runtime;
    } catch (error) {
        spinner.fail('Could not build the question index');
        throw error;
    }
}

function createUi(logger: Logger) {
    return {
        ...logger,
        warning: (text: string) => logger.warn(text),
        question: (text: string) => console.log(chalk.cyan(text)),
        source: (text: string) => console.log(chalk.gray(text)),
    };
}

type Ui = ReturnType<typeof createUi>;

function printOutcome(outcome: SimilarityOutcome, ui: Ui): void {
    if (outcome.status === 'failed') {
        ui.error(`Error: ${outcome.message}`);
        return;
    }

    if (outcome.exactMatchFound) {
        ui.warning(`⚠️  This question already exists in the corpus (question ${outcome.exactMatchId}).`);
    }

    if (outcome.similarQuestions.length === 0) {
        ui.success(`✅ No similar questions found at or above ${outcome.threshold}.`);
        return;
    }

    ui.info(`🔍 ${outcome.similarQuestions.length} similar question(s) at or above ${outcome.threshold}:`);
    for (const match of outcome.similarQuestions) {
        ui.question(`  [${match.question_id}] ${match.question}`);
        ui.source(`      score ${match.similarity_score.toFixed(4)} · ${match.domain} / ${match.subdomain}${match.is_exact_match ? ' · exact match' : ''}`);
    }
}

program
    .name('qsim')
    .description('Validate, refine and de-duplicate mathematical questions')
    .version('1.0.0')

program
    .command('similar')
    .description('Find corpus questions similar to the given question')
    .argument('<question...>', 'question text')
    .option('-t, --threshold <number>', 'minimum similarity score', parseThreshold)
    .option('-k, --top-k <number>', 'candidates retrieved before filtering', parseTopK)
    .option('--include-exact', 'keep exact matches in the results')
    .option('--json', 'print the raw outcome as JSON')
    .action(async (words: string[], options: { threshold?: number; topK?: number; includeExact?: boolean; json?: boolean }) => {
        const { config, logger } = setup();
        const runtime = await buildRuntime(config, logger);

        try {
            const handler = new SimilarityHandler(runtime.engine, logger);
            const outcome = await handler.run(words.join(' '), {
                threshold: options.threshold ?? config.similarity.threshold,
                topK: options.topK ?? config.similarity.topK,
                excludeExact: options.includeExact ? false : config.similarity.excludeExact,
            });

            if (options.json) {
                console.log(JSON.stringify(outcome.status === 'ok' ? outcome : { status: outcome.status, threshold: outcome.threshold, message: outcome.message }, null, 2));
            } else {
                printOutcome(outcome, createUi(logger));
            }
            if (outcome.status === 'failed') process.exitCode = 1;
        } finally {
            await runtime.close();
        }
    })

program
    .command('validate')
    .description('Check whether the input is a mathematical question')
    .argument('<question...>', 'question text')
    .action(async (words: string[]) => {
        const { config, logger } = setup();
        const spinner = ora('🧐 Validating...').start();
        const result = await new ValidationHandler(createLLM(config), logger).run(words.join(' '));
        spinner.stop();

        if (result.isValid) logger.success(result.message);
        else logger.warn(result.message);
        logger.debug(`Reasoning: ${result.reasoning}`);
        if (!result.isValid) process.exitCode = 1;
    })

program
    .command('refine')
    .description('Improve grammar, clarity and notation of a question')
    .argument('<question...>', 'question text')
    .action(async (words: string[]) => {
        const { config, logger } = setup();
        const spinner = ora('✏️  Refining...').start();
        const result = await new RefinementHandler(createLLM(config), logger).run(words.join(' '));
        spinner.stop();

        logger.success(`📝 ${result.refinedQuestion}`);
        logger.info(`Changes: ${result.changesMade}`);
    })

program
    .command('ask')
    .description('Validate, refine and check a question interactively')
    .action(async () => {
        const { config, logger } = setup();
        const ui = createUi(logger);
        const llm = createLLM(config);
        const validation = new ValidationHandler(llm, logger);
        const refinement = new RefinementHandler(llm, logger);
        const runtime = await buildRuntime(config, logger);
        const similarity = new SimilarityHandler(runtime.engine, logger);

        try {
            ui.info('🤖 Enter a mathematical question (type "exit" to quit)')

            while (true) {
                let question = await input({
                    message: chalk.cyan('Question:'),
                    validate: (input) => input.trim().length > 0 || 'Please enter a question'
                });

                if (question.trim().toLowerCase() === 'exit') break;

                let spinner = ora('🧐 Validating...').start();
                const validated = await validation.run(question);
                spinner.stop();

                if (!validated.isValid) {
                    ui.warning(validated.message);
                    continue;
                }
                ui.success(validated.message);

                spinner = ora('✏️  Refining...').start();
                const refined = await refinement.run(question);
                spinner.stop();

                ui.question(`📝 Refined: ${refined.refinedQuestion}`);
                ui.source(`Changes: ${refined.changesMade}`);

                const reply = await input({ message: 'Accept the refined question? (yes to accept, no to revise, anything else to choose)' });
                const intent = classifyReply(reply);
                if (intent === 'revise') {
                    ui.info('Please enter your revised question.');
                    continue;
                }
                if (intent === 'accept') {
                    question = refined.refinedQuestion;
                } else {
                    const choice = await select({
                        message: 'Which version should be checked?',
                        choices: [
                            { name: 'Refined question', value: refined.refinedQuestion },
                            { name: 'Original question', value: question },
                        ],
                    });
                    question = choice;
                }

                spinner = ora('🔍 Checking for similar questions...').start();
                const outcome = await similarity.run(question, config.similarity);
                spinner.stop();
                printOutcome(outcome, ui);
            }
        } finally {
            await runtime.close();
        }
    })

program.parseAsync().catch((error: unknown) => {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : 'Unknown error'}`));
    process.exit(1);
})
