/**
 * Tests for the REST endpoints and health check
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { Hono } from 'hono';

import { ErrorDetailSchema, TaskListSchema, createTestApp } from './helpers.js';
import { TaskSchema } from '../src/core/types.js';
import type { TaskService } from '../src/services/task-service.js';

function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  };
}

describe('REST API', () => {
  let app: Hono;
  let service: TaskService;

  beforeEach(() => {
    ({ app, service } = createTestApp());
  });

  describe('GET /health', () => {
    it('should report healthy with the task count', async () => {
      service.createTask({ title: 'one', description: '' });
      const res = await app.request('/health');
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'healthy',
        service: 'TodoList GraphQL API',
        taskCount: 1
      });
    });
  });

  describe('POST /api/v1/tasks', () => {
    it('should create a task', async () => {
      const res = await app.request('/api/v1/tasks', jsonRequest('POST', {
        title: 'Test Task',
        description: 'This is a test task'
      }));
      expect(res.status).toBe(201);
      expect(TaskSchema.parse(await res.json())).toEqual({
        id: 1,
        title: 'Test Task',
        description: 'This is a test task',
        completed: false
      });
    });

    it('should ignore a caller-supplied id', async () => {
      const res = await app.request('/api/v1/tasks', jsonRequest('POST', {
        id: 50,
        title: 'mine',
        description: ''
      }));
      expect(TaskSchema.parse(await res.json()).id).toBe(1);
    });

    it('should accept a trailing slash', async () => {
      const res = await app.request('/api/v1/tasks/', jsonRequest('POST', {
        title: 'Slashed',
        description: ''
      }));
      expect(res.status).toBe(201);
      expect(TaskSchema.parse(await res.json()).title).toBe('Slashed');
    });

    it('should reject an empty title', async () => {
      const res = await app.request('/api/v1/tasks', jsonRequest('POST', { title: '', description: 'x' }));
      expect(res.status).toBe(400);
      expect(ErrorDetailSchema.parse(await res.json())).toEqual({ detail: 'title: must not be empty' });
      expect(service.count()).toBe(0);
    });

    it('should reject a missing description', async () => {
      const res = await app.request('/api/v1/tasks', jsonRequest('POST', { title: 'no description' }));
      expect(res.status).toBe(400);
      expect(ErrorDetailSchema.parse(await res.json())).toEqual({ detail: 'description: Required' });
    });

    it('should reject a body that is not JSON', async () => {
      const res = await app.request('/api/v1/tasks', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: 'title=oops'
      });
      expect(res.status).toBe(400);
      expect(ErrorDetailSchema.parse(await res.json())).toEqual({ detail: 'Request body must be valid JSON' });
    });
  });

  describe('GET /api/v1/tasks', () => {
    it('should accept a trailing slash', async () => {
      service.createTask({ title: 'listed', description: '' });
      const res = await app.request('/api/v1/tasks/');
      expect(res.status).toBe(200);
      expect(TaskListSchema.parse(await res.json()).map(t => t.title)).toEqual(['listed']);
    });

    it('should list tasks in creation order', async () => {
      service.createTask({ title: 'a', description: '' });
      service.createTask({ title: 'b', description: '', completed: true });

      const res = await app.request('/api/v1/tasks');
      expect(res.status).toBe(200);
      expect(TaskListSchema.parse(await res.json())).toEqual([
        { id: 1, title: 'a', description: '', completed: false },
        { id: 2, title: 'b', description: '', completed: true }
      ]);
    });
  });

  describe('GET /api/v1/tasks/:taskId', () => {
    it('should return the task', async () => {
      service.createTask({ title: 'find me', description: 'here' });
      const res = await app.request('/api/v1/tasks/1');
      expect(res.status).toBe(200);
      expect(TaskSchema.parse(await res.json()).title).toBe('find me');
    });

    it('should answer 404 for an unknown task', async () => {
      const res = await app.request('/api/v1/tasks/999');
      expect(res.status).toBe(404);
      expect(ErrorDetailSchema.parse(await res.json())).toEqual({ detail: 'Task with ID 999 not found' });
    });

    it('should answer 404 for zero and negative ids', async () => {
      for (const id of ['0', '-1']) {
        const res = await app.request(`/api/v1/tasks/${id}`);
        expect(res.status).toBe(404);
        expect(ErrorDetailSchema.parse(await res.json())).toEqual({ detail: `Task with ID ${id} not found` });
      }
    });

    it('should answer 400 for an id that is not an integer', async () => {
      for (const id of ['abc', '1.5']) {
        const res = await app.request(`/api/v1/tasks/${id}`);
        expect(res.status).toBe(400);
        expect(ErrorDetailSchema.parse(await res.json())).toEqual({
          detail: 'Task ID must be an integer'
        });
      }
    });

    it('should answer 400 for an id beyond the safe integer range', async () => {
      const res = await app.request('/api/v1/tasks/9007199254740993');
      expect(res.status).toBe(400);
      expect(ErrorDetailSchema.parse(await res.json())).toEqual({
        detail: 'Task ID must be a safe integer'
      });
    });
  });

  describe('PUT /api/v1/tasks/:taskId', () => {
    it('should apply a partial update', async () => {
      service.createTask({ title: 'Partial Update Task', description: 'Original description' });

      const res = await app.request('/api/v1/tasks/1', jsonRequest('PUT', { completed: true }));
      expect(res.status).toBe(200);
      expect(TaskSchema.parse(await res.json())).toEqual({
        id: 1,
        title: 'Partial Update Task',
        description: 'Original description',
        completed: true
      });
    });

    it('should answer 404 for an unknown task', async () => {
      const res = await app.request('/api/v1/tasks/999', jsonRequest('PUT', { title: 'Updated' }));
      expect(res.status).toBe(404);
      expect(ErrorDetailSchema.parse(await res.json())).toEqual({ detail: 'Task with ID 999 not found' });
    });

    it('should answer 400 for a wrongly typed field', async () => {
      service.createTask({ title: 'typed', description: '' });
      const res = await app.request('/api/v1/tasks/1', jsonRequest('PUT', { completed: 'yes' }));
      expect(res.status).toBe(400);
      expect(ErrorDetailSchema.parse(await res.json())).toEqual({
        detail: 'completed: Expected boolean, received string'
      });
      expect(service.getTask(1)?.completed).toBe(false);
    });
  });

  describe('DELETE /api/v1/tasks/:taskId', () => {
    it('should delete the task and answer 204', async () => {
      service.createTask({ title: 'temp', description: '' });

      const res = await app.request('/api/v1/tasks/1', { method: 'DELETE' });
      expect(res.status).toBe(204);
      expect(await res.text()).toBe('');

      const after = await app.request('/api/v1/tasks/1');
      expect(after.status).toBe(404);
    });

    it('should answer 404 for an unknown task', async () => {
      const res = await app.request('/api/v1/tasks/999', { method: 'DELETE' });
      expect(res.status).toBe(404);
      expect(ErrorDetailSchema.parse(await res.json())).toEqual({ detail: 'Task with ID 999 not found' });
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const res = await app.request('/api/v2/anything');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: 'Not found' });
  });
});
