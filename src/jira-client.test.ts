import { describe, it, expect } from 'vitest';
import { ApiError } from './errors.js';
import { JiraClient } from './jira-client.js';
import { requestBody, stubAdapter } from './test-utils.js';
import type { JiraConfig } from './types.js';

const config: JiraConfig = {
  baseUrl: 'https://jira.example.com',
  email: 'ci@example.com',
  apiToken: 'test-token',
  timeoutMs: 1000,
};

describe('JiraClient', () => {
  describe('getIssue', () => {
    it('requests project and components with basic auth', async () => {
      const { adapter, requests } = stubAdapter(() => ({
        status: 200,
        data: {
          id: '10001',
          key: 'CA-12',
          fields: {
            project: { id: 10000, key: 'CA' },
            components: [{ id: '5', name: 'web' }],
          },
        },
      }));
      const client = new JiraClient(config, adapter);

      const result = await client.getIssue('CA-12');

      expect(result).toEqual({
        ok: true,
        value: {
          key: 'CA-12',
          projectKey: 'CA',
          projectId: '10000',
          components: [{ id: '5', name: 'web' }],
        },
      });
      expect(requests).toHaveLength(1);
      expect(requests[0].method).toBe('get');
      expect(requests[0].baseURL).toBe('https://jira.example.com/rest/api/3');
      expect(requests[0].url).toBe('/issue/CA-12');
      expect(requests[0].params).toEqual({ fields: 'project,components' });
      expect(requests[0].auth).toEqual({ username: 'ci@example.com', password: 'test-token' });
      expect(requests[0].timeout).toBe(1000);
    });

    it('defaults missing components to an empty list', async () => {
      const { adapter } = stubAdapter(() => ({
        status: 200,
        data: { id: '1', key: 'CA-1', fields: { project: { id: '2', key: 'CA' } } },
      }));

      const result = await new JiraClient(config, adapter).getIssue('CA-1');

      expect(result.ok && result.value.components).toEqual([]);
    });

    it('returns an ApiError for a non-2xx response', async () => {
      const { adapter } = stubAdapter(() => ({
        status: 404,
        data: { errorMessages: ['Issue does not exist or you do not have permission to see it.'] },
      }));

      const result = await new JiraClient(config, adapter).getIssue('CA-404');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ApiError);
      expect(result.error.status).toBe(404);
      expect(result.error.describe()).toBe(
        'Fetch issue CA-404 failed with HTTP 404 - response: ' +
        '{"errorMessages":["Issue does not exist or you do not have permission to see it."]}'
      );
    });

    it('returns an ApiError when the transport fails', async () => {
      const { adapter } = stubAdapter(() => {
        throw new Error('socket hang up');
      });

      const result = await new JiraClient(config, adapter).getIssue('CA-1');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('Fetch issue CA-1 failed: socket hang up');
      expect(result.error.status).toBeUndefined();
    });
  });

  describe('listProjectComponents', () => {
    it('returns the components with string ids', async () => {
      const { adapter, requests } = stubAdapter(() => ({
        status: 200,
        data: [{ id: 7, name: 'api' }, { id: '8', name: 'web' }],
      }));

      const result = await new JiraClient(config, adapter).listProjectComponents('CA');

      expect(result).toEqual({ ok: true, value: [{ id: '7', name: 'api' }, { id: '8', name: 'web' }] });
      expect(requests[0].url).toBe('/project/CA/components');
    });
  });

  describe('createComponent', () => {
    it('posts the component', async () => {
      const { adapter, requests } = stubAdapter(() => ({
        status: 201,
        data: { id: '31', name: 'payments-service' },
      }));

      const result = await new JiraClient(config, adapter).createComponent({
        name: 'payments-service',
        project: 'CA',
        description: 'Component for payments-service repository',
        leadAccountId: 'lead-account',
      });

      expect(result).toEqual({ ok: true, value: { id: '31', name: 'payments-service' } });
      expect(requests[0].method).toBe('post');
      expect(requests[0].url).toBe('/component');
      expect(requestBody(requests[0])).toEqual({
        name: 'payments-service',
        project: 'CA',
        description: 'Component for payments-service repository',
        leadAccountId: 'lead-account',
      });
    });

    it('treats a 409 as already created and re-lists', async () => {
      const { adapter, requests } = stubAdapter(request => {
        if (request.method === 'post') {
          return { status: 409, data: { errorMessages: ['Component already exists'] } };
        }
        return { status: 200, data: [{ id: '12', name: 'other' }, { id: '31', name: 'payments-service' }] };
      });

      const result = await new JiraClient(config, adapter).createComponent({ name: 'payments-service', project: 'CA' });

      expect(result).toEqual({ ok: true, value: { id: '31', name: 'payments-service' } });
      expect(requests.map(r => `${r.method} ${r.url}`)).toEqual(['post /component', 'get /project/CA/components']);
    });

    it('keeps the 409 error when the component still cannot be found', async () => {
      const { adapter } = stubAdapter(request =>
        request.method === 'post' ? { status: 409 } : { status: 200, data: [] }
      );

      const result = await new JiraClient(config, adapter).createComponent({ name: 'payments-service', project: 'CA' });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.status).toBe(409);
    });

    it('returns other failures as errors', async () => {
      const { adapter } = stubAdapter(() => ({ status: 403, data: { errorMessages: ['Forbidden'] } }));

      const result = await new JiraClient(config, adapter).createComponent({ name: 'x', project: 'CA' });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe('Create component x in CA failed with HTTP 403');
    });
  });

  describe('addComponentToIssue', () => {
    it('sends an additive update', async () => {
      const { adapter, requests } = stubAdapter(() => ({ status: 204 }));

      const result = await new JiraClient(config, adapter).addComponentToIssue('CA-12', '31');

      expect(result).toEqual({ ok: true, value: undefined });
      expect(requests[0].method).toBe('put');
      expect(requests[0].url).toBe('/issue/CA-12');
      expect(requestBody(requests[0])).toEqual({ update: { components: [{ add: { id: '31' } }] } });
    });

    it('fails on a 400 when the field is not on the screen', async () => {
      const { adapter } = stubAdapter(() => ({
        status: 400,
        data: { errors: { components: 'Field cannot be set.' } },
      }));

      const result = await new JiraClient(config, adapter).addComponentToIssue('CA-12', '31');

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.status).toBe(400);
    });
  });

  describe('setIssueComponents', () => {
    it('replaces the component field', async () => {
      const { adapter, requests } = stubAdapter(() => ({ status: 204 }));

      const result = await new JiraClient(config, adapter).setIssueComponents('CA-12', ['web', 'payments-service']);

      expect(result.ok).toBe(true);
      expect(requestBody(requests[0])).toEqual({
        fields: { components: [{ name: 'web' }, { name: 'payments-service' }] },
      });
    });
  });
});
