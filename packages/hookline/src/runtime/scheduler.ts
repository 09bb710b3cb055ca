import { Cron } from 'croner'
import type { Schedule } from '../config/types.ts'
import type { Logger } from '../logger/index.ts'

interface PeriodicTask {
	name: string
	schedule: Schedule
	handler: () => Promise<void>
	current: Promise<void> | null
	cron: Cron | null
	timer: ReturnType<typeof setInterval> | null
}

export function describeSchedule(schedule: Schedule): string {
	return 'cron' in schedule ? `cron ${schedule.cron}` : `every ${schedule.intervalSeconds}s`
}

/**
 * Runs named periodic tasks on an interval or a cron pattern.
 * A tick that arrives while the previous run is still going is skipped.
 */
export class Scheduler {
	private readonly tasks = new Map<string, PeriodicTask>()
	private running = false

	constructor(private readonly logger: Logger) {}

	/**
	 * Add a periodic task. Cron patterns are parsed here, so a bad pattern
	 * fails at registration rather than at start.
	 */
	add(name: string, schedule: Schedule, handler: () => Promise<void>): void {
		if (this.tasks.has(name)) {
			throw new Error(`Task already scheduled: ${name}`)
		}

		const task: PeriodicTask = { name, schedule, handler, current: null, cron: null, timer: null }
		if ('cron' in schedule) {
			task.cron = new Cron(schedule.cron, { paused: true }, () => {
				void this.tick(task)
			})
		}
		this.tasks.set(name, task)

		if (this.running) this.arm(task)
		this.logger.debug(`[Scheduler] Registered ${name} (${describeSchedule(schedule)})`)
	}

	start(): void {
		if (this.running) return
		this.running = true
		for (const task of this.tasks.values()) this.arm(task)
		this.logger.info('[Scheduler] Started', { tasks: [...this.tasks.keys()] })
	}

	/** Stop all timers and wait for runs in progress */
	async stop(): Promise<void> {
		this.running = false
		const inProgress: Promise<void>[] = []
		for (const task of this.tasks.values()) {
			task.cron?.pause()
			if (task.timer) {
				clearInterval(task.timer)
				task.timer = null
			}
			if (task.current) inProgress.push(task.current)
		}
		await Promise.allSettled(inProgress)
		this.logger.info('[Scheduler] Stopped')
	}

	/** Run a task immediately, sharing the no-overlap guard with its schedule */
	async runNow(name: string): Promise<void> {
		const task = this.tasks.get(name)
		if (!task) throw new Error(`Unknown task: ${name}`)
		await this.tick(task)
	}

	/** Next time the task is due, when the schedule can tell */
	nextRun(name: string): Date | null {
		return this.tasks.get(name)?.cron?.nextRun() ?? null
	}

	isRunning(name: string): boolean {
		const task = this.tasks.get(name)
		return task ? task.current !== null : false
	}

	private arm(task: PeriodicTask): void {
		if (task.cron) {
			task.cron.resume()
			return
		}
		if ('intervalSeconds' in task.schedule) {
			task.timer = setInterval(() => {
				void this.tick(task)
			}, task.schedule.intervalSeconds * 1000)
		}
	}

	private tick(task: PeriodicTask): Promise<void> {
		if (task.current) {
			this.logger.debug(`[Scheduler] ${task.name} still running, skipping tick`)
			return task.current
		}

		const run = this.execute(task).finally(() => {
			task.current = null
		})
		task.current = run
		return run
	}

	private async execute(task: PeriodicTask): Promise<void> {
		const started = Date.now()
		try {
			await task.handler()
			this.logger.debug(`[Scheduler] ${task.name} finished`, { durationMs: Date.now() - started })
		} catch (err) {
			this.logger.error(`[Scheduler] Task ${task.name} failed`, err)
		}
	}
}
