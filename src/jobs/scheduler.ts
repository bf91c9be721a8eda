import cron, { type ScheduledTask } from 'node-cron';

/**
 * In-process job scheduler. Schedules run in UTC; one instance per
 * deployment should enable it (see resolveSchedulerStartupMode).
 */

export type JobDefinition = {
  name: string;
  schedule: string;
  task: () => Promise<void>;
  enabled: boolean;
};

const jobs = new Map<string, ScheduledTask>();
const jobDefinitions: JobDefinition[] = [];
const running = new Set<string>();

/** Runs `task` with start and finish logging; a failure is logged and returned. */
async function runJob(name: string, task: () => Promise<void>, label: string): Promise<{ ok: boolean; error?: unknown }> {
  console.log(`🚀 Starting ${label.toLowerCase()}: ${name}`);
  const startTime = Date.now();
  try {
    await task();
    console.log(`✅ ${label} "${name}" completed in ${Date.now() - startTime}ms`);
    return { ok: true };
  } catch (error) {
    console.error(`❌ ${label} "${name}" failed:`, error);
    return { ok: false, error };
  }
}

/**
 * Registers a cron job. A tick that fires while the previous run of the same
 * job is still in progress is skipped.
 */
export function registerJob(
  name: string,
  schedule: string,
  task: () => Promise<void>,
  enabled: boolean = true
): void {
  if (jobDefinitions.some((job) => job.name === name)) {
    console.warn(`⚠️  Job "${name}" already registered, skipping`);
    return;
  }
  if (!cron.validate(schedule)) {
    throw new Error(`Invalid cron expression for job "${name}": ${schedule}`);
  }

  jobDefinitions.push({ name, schedule, enabled, task });

  if (!enabled) {
    console.log(`📅 Job "${name}" registered but disabled`);
    return;
  }

  const scheduledTask = cron.schedule(
    schedule,
    async () => {
      if (running.has(name)) {
        console.warn(`⏭️  Job "${name}" still running, skipping tick`);
        return;
      }
      running.add(name);
      try {
        await runJob(name, task, 'Job');
      } finally {
        running.delete(name);
      }
    },
    { scheduled: false, timezone: 'UTC' }
  );

  jobs.set(name, scheduledTask);
  console.log(`📅 Job "${name}" scheduled: ${schedule} (UTC)`);
}

export function startScheduler(): void {
  console.log(`\n🕐 Starting job scheduler (${jobs.size} jobs)`);
  for (const task of jobs.values()) {
    task.start();
  }
  if (jobs.size === 0) {
    console.log('   No jobs registered');
  }
}

export function stopScheduler(): void {
  console.log('\n🛑 Stopping job scheduler');
  for (const [name, task] of jobs.entries()) {
    task.stop();
    console.log(`   Stopped: ${name}`);
  }
  jobs.clear();
  jobDefinitions.length = 0;
}

export function getJobDefinitions(): JobDefinition[] {
  return [...jobDefinitions];
}

/** Runs a registered job immediately, outside its schedule. */
export async function triggerJob(name: string): Promise<void> {
  const definition = jobDefinitions.find((job) => job.name === name);
  if (!definition) {
    throw new Error(`Job "${name}" not found`);
  }
  const outcome = await runJob(name, definition.task, 'Manual job');
  if (!outcome.ok) {
    throw outcome.error;
  }
}
