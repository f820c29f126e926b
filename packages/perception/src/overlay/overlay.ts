/**
 * Overlay Resource
 *
 * Task pipeline over a DrawSurface. The loop calls `render` once per
 * executed tick; a failing task is logged and the other tasks still draw.
 * Tasks never see the loop's own result, decision or actuator objects.
 */

import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { createTaskPipeline } from '@sweepwatch/system'
import type { PerceptionConfig } from '../vocabulary/configSchemas'
import { createNullSurface, createTextSurface } from './surface'
import { defaultOverlayTasks } from './tasks'
import type { DrawSurface, OverlayContext, OverlayFrame, OverlayTask } from './types'

export type SurfaceFactory = (config: PerceptionConfig) => DrawSurface

export const defaultSurfaceFactory: SurfaceFactory = (config) =>
  config.overlay === 'terminal' ? createTextSurface() : createNullSurface()

export const createOverlayResource = (
  createSurface: SurfaceFactory = defaultSurfaceFactory,
  tasks: () => Array<OverlayTask> = defaultOverlayTasks,
) =>
  defineResource({
    dependencies: ['config'],
    start: async ({ config }: { config: PerceptionConfig }) => {
      const surface = createSurface(config)

      const pipeline = createTaskPipeline<OverlayContext>({
        contextInit: () => undefined,
        onError: (error) => console.error('[Overlay] Task error:', error),
      })

      for (const task of tasks()) {
        await pipeline.addTask(task)
      }

      console.log(`[Overlay] Rendering to ${surface.describe} (${pipeline.size()} tasks)`)

      const render = (frame: OverlayFrame) => {
        surface.beginFrame(frame.frameWidth, frame.frameHeight)
        pipeline.execute({
          ...frame,
          result: frame.result === null ? null : structuredClone(frame.result),
          decision: structuredClone(frame.decision),
          actuator: Object.freeze({ ...frame.actuator }),
          surface,
        })
        try {
          surface.present()
        } catch (error) {
          console.error('[Overlay] Present failed:', error)
        }
      }

      return {
        surface,
        render,
        addTask: pipeline.addTask,
        clear: pipeline.clear,
      }
    },
    halt: (overlay) => {
      overlay.clear()
      overlay.surface.close?.()
      console.log('[Overlay] Halted')
    },
  })

export type OverlayResource = StartedResource<ReturnType<typeof createOverlayResource>>
