#!/usr/bin/env node

import { Command } from 'commander';
import { getConfig } from '../config/index.js';
import {
  ChangeDetector,
  Fetcher,
  HttpRawFetcher,
  LoadOptions,
  MonitorService,
  createMonitorService,
} from '../monitoring/index.js';
import { CheckResult, MonitorMode, TaskView } from '../monitoring/types.js';
import { errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger('monitor-cli');

const program = new Command();

program
  .name('monitor')
  .description('Web page and notice list change monitor')
  .version('1.0.0');

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function formatDate(date: Date | null): string {
  return date ? date.toLocaleString() : 'Never';
}

/**
 * Load the snapshot, run the action, then release the store. Writing
 * commands take the writer lock and fail while a daemon holds it.
 */
async function withService(
  label: string,
  action: (service: MonitorService) => Promise<void>,
  options: LoadOptions = {}
): Promise<void> {
  const service = createMonitorService(getConfig());
  try {
    await service.load(options);
    await action(service);
  } catch (error) {
    logger.error({ error: errorMessage(error) }, `Failed to ${label}`);
    console.error('Error:', errorMessage(error));
    process.exitCode = 1;
  } finally {
    await service.stop();
  }
}

function printTask(task: TaskView): void {
  const icon = task.status === 'healthy' ? '✓' : task.status === 'disabled' ? '⏸' : task.status === 'pending' ? '⏳' : '⚠️';
  console.log(`\n${icon} ${task.id}  ${task.resource}`);
  console.log(`   Mode: ${task.mode}${task.list ? ` (${task.list.itemSelector})` : ''}`);
  console.log(`   Interval: ${task.interval}s`);
  console.log(`   Destination: ${task.destination}`);
  console.log(`   Status: ${task.status}${task.failureCount > 0 ? ` (${task.failureCount} consecutive failures)` : ''}`);
  console.log(`   Last checked: ${formatDate(task.lastCheckedAt)}`);
  console.log(`   Last changed: ${formatDate(task.lastChangedAt)}`);
  if (task.nextDueAt) {
    console.log(`   Next due: ${task.nextDueAt.toLocaleString()}`);
  }
  if (task.list?.keywords?.length) {
    console.log(`   Keywords: ${task.list.keywords.join(', ')}`);
  }
  if (task.lastError) {
    console.log(`   Last error: ${task.lastError}`);
  }
}

function printCheckResult(result: CheckResult): void {
  console.log('━'.repeat(60));
  console.log(`Outcome: ${result.outcome}`);
  if (result.error) console.log(`Error: ${result.error}`);
  console.log(`New items: ${result.newItems}`);
  console.log(`Notifications: ${result.events.length} (${result.deliveryFailures} failed)`);
  if (!result.committed) console.log('Warning: state not yet saved, will retry');
  for (const event of result.events.slice(0, 5)) {
    console.log(`  - [${event.kind}] ${event.summary.split('\n')[0]}`);
  }
  if (result.events.length > 5) {
    console.log(`  ... and ${result.events.length - 5} more`);
  }
  console.log('━'.repeat(60));
}

interface AddCommandOptions {
  interval: string;
  destination: string;
  list: boolean;
  selector?: string;
  keyword: string[];
  ignore: string[];
  disabled: boolean;
}

program
  .command('add <url>')
  .description('Start monitoring a URL')
  .requiredOption('-d, --destination <ref>', 'Where to notify, e.g. telegram:123456 or log:main')
  .option('-i, --interval <seconds>', 'Poll interval in seconds', '600')
  .option('--list', 'Treat the page as a list of items', false)
  .option('-s, --selector <css>', 'CSS selector for list items')
  .option('-k, --keyword <word>', 'Only notify items whose title contains this (repeatable)', collect, [])
  .option('--ignore <regex>', 'Extra volatile pattern stripped before fingerprinting (repeatable)', collect, [])
  .option('--disabled', 'Add without scheduling', false)
  .action(async (url: string, options: AddCommandOptions) => {
    await withService('add task', async (service) => {
      const mode: MonitorMode = options.list ? 'list' : 'page';
      const id = await service.add(url, parseInt(options.interval, 10), options.destination, {
        mode,
        list: { ...(options.selector ? { itemSelector: options.selector } : {}), keywords: options.keyword },
        ignorePatterns: options.ignore,
        enabled: !options.disabled,
      });
      console.log(`\n✓ Added task ${id}`);
      printTask(service.get(id));
      console.log('');
    });
  });

program
  .command('remove <id>')
  .description('Stop monitoring and delete a task')
  .action(async (id: string) => {
    await withService('remove task', async (service) => {
      await service.remove(id);
      console.log(`✓ Removed task ${id}`);
    });
  });

program
  .command('enable <id>')
  .description('Resume scheduling a task')
  .action(async (id: string) => {
    await withService('enable task', async (service) => {
      await service.enable(id);
      console.log(`✓ Enabled task ${id}`);
    });
  });

program
  .command('disable <id>')
  .description('Pause scheduling a task')
  .action(async (id: string) => {
    await withService('disable task', async (service) => {
      await service.disable(id);
      console.log(`✓ Disabled task ${id}`);
    });
  });

program
  .command('list')
  .description('List monitored tasks')
  .action(async () => {
    await withService('list tasks', async (service) => {
      const tasks = service.list();
      console.log('\n📋 Monitored Tasks\n');
      console.log('━'.repeat(80));
      if (tasks.length === 0) {
        console.log('No tasks found.');
      } else {
        tasks.forEach(printTask);
      }
      console.log('\n' + '━'.repeat(80));
    }, { readOnly: true });
  });

program
  .command('check <id>')
  .description('Check one task now and send any notifications')
  .action(async (id: string) => {
    await withService('check task', async (service) => {
      console.log(`\n🔍 Checking ${id}...\n`);
      printCheckResult(await service.checkNow(id));
    });
  });

program
  .command('reset-dedup')
  .description('Forget every seen item (items will be notified again)')
  .option('--yes', 'Confirm the reset', false)
  .action(async (options: { yes: boolean }) => {
    if (!options.yes) {
      console.error('Refusing to reset without --yes');
      process.exitCode = 1;
      return;
    }
    await withService('reset dedup store', async (service) => {
      const before = service.getStatus().dedupEntries;
      await service.resetDedup();
      console.log(`✓ Cleared ${before} seen item(s)`);
    });
  });

program
  .command('status')
  .description('Show monitor status summary')
  .action(async () => {
    await withService('get status', async (service) => {
      const status = service.getStatus();
      console.log('\n📊 Monitor Status\n');
      console.log('━'.repeat(40));
      console.log(`Total tasks: ${status.tasks}`);
      console.log('\nBy status:');
      for (const [name, count] of Object.entries(status.byStatus)) {
        console.log(`  ${name}: ${count}`);
      }
      console.log(`\nSeen items: ${status.dedupEntries}`);
      console.log(`Tracked notices: ${status.notices}`);
      console.log('━'.repeat(40));
      console.log('');
    }, { readOnly: true });
  });

program
  .command('notices')
  .description('Show tracked notices with registration deadlines')
  .action(async () => {
    await withService('list notices', async (service) => {
      const notices = service.listNotices();
      console.log('\n🗓  Notices\n');
      console.log('━'.repeat(80));
      if (notices.length === 0) {
        console.log('No notices tracked.');
      }
      for (const notice of notices) {
        console.log(`\n${notice.title}`);
        console.log(`   URL: ${notice.url}`);
        console.log(`   Opens: ${notice.startDate ?? 'unknown'}  Closes: ${notice.endDate ?? 'unknown'}`);
        if (notice.anomaly) {
          console.log(`   ⚠️  Date anomaly: ${notice.anomaly}`);
        }
      }
      console.log('\n' + '━'.repeat(80));
    }, { readOnly: true });
  });

program
  .command('run')
  .description('Run the scheduler in the foreground until interrupted')
  .action(async () => {
    const service = createMonitorService(getConfig());
    try {
      await service.load();
      service.start();
      console.log('Monitor running, press Ctrl+C to stop');
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Failed to start');
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }

    const shutdown = (): void => {
      service.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('Error:', errorMessage(error));
          process.exit(1);
        }
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });

program
  .command('test-fetch <url>')
  .description('Fetch a URL and show its fingerprint (does not save results)')
  .option('--list', 'Extract list items', false)
  .option('-s, --selector <css>', 'CSS selector for list items', 'a[href]')
  .action(async (url: string, options: { list: boolean; selector: string }) => {
    try {
      const config = getConfig();
      const fetcher = new Fetcher(new HttpRawFetcher(config.fetch.userAgent), config.fetch);
      const detector = new ChangeDetector(config.normalize);

      console.log(`\n🔍 Test fetching ${url}...\n`);
      console.log('━'.repeat(60));

      const content = await fetcher.fetch(url);
      const fingerprint = detector.fingerprint(content, detector.rulesFor({}));

      console.log(`\n✓ Fetch successful`);
      console.log(`   Content length: ${content.length} chars`);
      console.log(`   Fingerprint: ${fingerprint.digest.substring(0, 16)}...`);
      console.log(`   Summary: ${fingerprint.summary ?? ''}`);

      if (options.list) {
        const items = detector.extractItems(content, url, { itemSelector: options.selector });
        console.log(`\nItems extracted: ${items.length}`);
        for (const item of items.slice(0, 10)) {
          console.log(`  - ${item.title}`);
          console.log(`    URL: ${item.url}`);
        }
        if (items.length > 10) {
          console.log(`  ... and ${items.length - 10} more items`);
        }
      }

      console.log('\n' + '━'.repeat(60));
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exit(1);
    }
  });

program.parse();
