import { describe, it } from 'node:test';
import assert from 'node:assert';
import { createClient } from '@supabase/supabase-js';
import { AppError } from '@/src/lib/errors/app-error';
import type { UserProfile } from '@/src/lib/plans/plans.types';
import {
  ConditionGuidanceService,
  formatConditionGuidance,
} from './conditionGuidance.service';

const profile: UserProfile = {
  age: 58,
  gender: 'male',
  heightCm: 175,
  weightKg: 90,
  medicalConditions: ['Hypertension', 'Type 2 Diabetes'],
  dietaryRestrictions: [],
  fitnessLevel: 'beginner',
};

function fakeSupabase(status: number, body: unknown) {
  const urls: string[] = [];
  const fakeFetch: typeof fetch = async (input) => {
    urls.push(input instanceof Request ? input.url : String(input));
    return new Response(JSON.stringify(body), {
      status,
      headers: { 'Content-Type': 'application/json' },
    });
  };
  const client = createClient('http://localhost:54321', 'test-secret', {
    global: { fetch: fakeFetch },
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return { client, urls };
}

describe('formatConditionGuidance', () => {
  it('groups guidance per condition in declaration order', () => {
    const text = formatConditionGuidance(
      ['type_2_diabetes', 'hypertension'],
      [
        { condition: 'hypertension', plan_type: 'diet', guidance: 'Keep sodium low', source: 'DASH' },
        { condition: 'type_2_diabetes', plan_type: 'both', guidance: 'Spread carbohydrates' },
      ],
    );
    assert.strictEqual(
      text,
      '### type_2_diabetes\n- Spread carbohydrates\n\n### hypertension\n- Keep sodium low (DASH)',
    );
  });

  it('is empty without rows', () => {
    assert.strictEqual(formatConditionGuidance(['asthma'], []), '');
  });
});

describe('ConditionGuidanceService', () => {
  it('queries guidance for the normalized conditions and plan type', async () => {
    const { client, urls } = fakeSupabase(200, [
      { condition: 'hypertension', plan_type: 'diet', guidance: 'Keep sodium low', source: null },
      { condition: 'hypertension', plan_type: 'both', guidance: 42 },
    ]);
    const service = new ConditionGuidanceService({ supabase: client });

    const context = await service.fetchContext('diet', profile);

    assert.strictEqual(context, '### hypertension\n- Keep sodium low');
    assert.strictEqual(urls.length, 1);
    const url = decodeURIComponent(urls[0]);
    assert.ok(url.includes('/rest/v1/condition_guidance?'));
    assert.ok(url.includes('condition=in.(hypertension,type_2_diabetes)'));
    assert.ok(url.includes('plan_type=in.(diet,both)'));
  });

  it('skips the lookup when the user has no conditions', async () => {
    const { client, urls } = fakeSupabase(200, []);
    const service = new ConditionGuidanceService({ supabase: client });

    const context = await service.fetchContext('exercise', {
      ...profile,
      medicalConditions: [],
    });

    assert.strictEqual(context, '');
    assert.strictEqual(urls.length, 0);
  });

  it('raises DB_ERROR when the query fails', async () => {
    const { client } = fakeSupabase(500, { message: 'connection refused' });
    const service = new ConditionGuidanceService({ supabase: client });

    await assert.rejects(
      service.fetchContext('diet', profile),
      (error: unknown) => error instanceof AppError && error.code === 'DB_ERROR',
    );
  });
});
