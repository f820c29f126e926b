/**
 * Task Pipeline
 *
 * Ordered list of per-tick tasks with an optional init/execute/cleanup
 * lifecycle. A failing task is reported and the rest of the pipeline still
 * runs, so one broken overlay element never blanks the others.
 */

export type TaskWithLifecycle<TContext, TContextInit> = {
  init?: (contextInit: TContextInit) => void | Promise<void>
  execute: (context: TContext) => void
  cleanup?: () => void
}

export type TaskFn<TContext> = (context: TContext) => void

export type TaskDefinition<TContext, TContextInit = undefined> =
  | TaskWithLifecycle<TContext, TContextInit>
  | TaskFn<TContext>

export type TaskPipeline<TContext, TContextInit> = {
  /**
   * Add a task. Resolves once the task's init has finished and the task is
   * part of the pipeline; the resolved function removes it again.
   */
  addTask: (task: TaskDefinition<TContext, TContextInit>) => Promise<() => void>

  /** Run every initialized task, in insertion order */
  execute: (context: TContext) => void

  /** Remove all tasks, calling cleanup on each */
  clear: () => void

  size: () => number
}

export type TaskPipelineOptions<TContext, TContextInit> = {
  /** Evaluated once per added task, passed to its init */
  contextInit: () => TContextInit

  /** Called for execute and cleanup failures. Without it, errors are thrown. */
  onError?: (error: Error, task: TaskDefinition<TContext, TContextInit>) => void
}

const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value))

export const createTaskPipeline = <TContext, TContextInit = undefined>(
  options: TaskPipelineOptions<TContext, TContextInit>,
): TaskPipeline<TContext, TContextInit> => {
  const { contextInit, onError } = options
  const tasks: Array<TaskDefinition<TContext, TContextInit>> = []

  // Same task instance added twice while its init is pending shares one init
  const initializing = new WeakMap<
    TaskWithLifecycle<TContext, TContextInit>,
    Promise<void>
  >()

  const report = (error: unknown, task: TaskDefinition<TContext, TContextInit>) => {
    if (!onError) throw error
    onError(toError(error), task)
  }

  const remover = (task: TaskDefinition<TContext, TContextInit>) => () => {
    const index = tasks.indexOf(task)
    if (index === -1) return
    tasks.splice(index, 1)
    if (typeof task !== 'function') {
      task.cleanup?.()
    }
  }

  return {
    addTask: async (task) => {
      if (typeof task === 'function') {
        tasks.push(task)
        return remover(task)
      }

      const pendingInit = initializing.get(task)
      if (pendingInit) {
        await pendingInit
        return remover(task)
      }

      const initResult = task.init?.(contextInit())
      if (initResult instanceof Promise) {
        initializing.set(task, initResult)
        try {
          await initResult
        } finally {
          initializing.delete(task)
        }
      }

      tasks.push(task)
      return remover(task)
    },

    execute: (context) => {
      for (const task of [...tasks]) {
        try {
          if (typeof task === 'function') {
            task(context)
          } else {
            task.execute(context)
          }
        } catch (error) {
          report(error, task)
        }
      }
    },

    clear: () => {
      const removed = tasks.splice(0, tasks.length)
      for (const task of removed) {
        if (typeof task === 'function') continue
        try {
          task.cleanup?.()
        } catch (error) {
          if (onError) {
            onError(toError(error), task)
          } else {
            console.error('[TaskPipeline] Task cleanup error:', error)
          }
        }
      }
    },

    size: () => tasks.length,
  }
}
