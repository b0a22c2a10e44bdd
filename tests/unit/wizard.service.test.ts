import { describe, it, expect, beforeEach } from 'vitest';
import {
  draftKey,
  draftProgress,
  isComplete,
  loadDraft,
  missingSteps,
  saveStep,
  stagedFiles,
} from '../../src/modules/applications/wizard.service';
import { Step1Data, Step2Data } from '../../src/modules/applications/applications.validation';
import { MemoryCacheStore } from '../utils/memory-cache';

const step1: Step1Data = {
  reward_id: 7,
  first_name: 'Aziza',
  last_name: 'Karimova',
  pinfl: '30101950123456',
  phone_number: '+998901112233',
  area: 'bukhara',
  district: 'Gijduvan',
  neighborhood: 'Navbahor',
};

const step2: Step2Data = {
  activity: 'Teaching',
  activity_description: 'Runs free evening classes in mathematics for village children every week.',
};

describe('wizard drafts', () => {
  let store: MemoryCacheStore;

  beforeEach(() => {
    store = new MemoryCacheStore();
  });

  it('keys drafts by user and reward', () => {
    expect(draftKey(3, 7)).toBe('application_draft:3:7');
  });

  it('merges each step into the same bucket', async () => {
    await saveStep(3, 7, { step: 1, data: step1 }, store);
    const draft = await saveStep(3, 7, { step: 2, data: step2 }, store);

    expect(draft).toEqual({ reward_id: 7, current_step: 2, step1_data: step1, step2_data: step2 });
    expect(await loadDraft(3, 7, store)).toEqual(draft);
    expect(await loadDraft(3, 8, store)).toBeNull();
  });

  it('lets the last write of a step win', async () => {
    await saveStep(3, 7, { step: 1, data: step1 }, store);
    await saveStep(3, 7, { step: 1, data: { ...step1, district: 'Vobkent' } }, store);

    const draft = await loadDraft(3, 7, store);
    expect(draft?.step1_data?.district).toBe('Vobkent');
  });

  it('ignores a bucket that does not look like a draft', async () => {
    await store.set(draftKey(3, 7), { reward_id: 'seven' }, 60);

    expect(await loadDraft(3, 7, store)).toBeNull();
  });

  it('lists the steps still missing', async () => {
    expect(missingSteps(null)).toEqual(['step1_data', 'step2_data', 'step3_data']);

    const draft = await saveStep(3, 7, { step: 2, data: step2 }, store);
    expect(missingSteps(draft)).toEqual(['step1_data', 'step3_data']);
    expect(isComplete(draft)).toBe(false);

    await saveStep(3, 7, { step: 1, data: step1 }, store);
    const complete = await saveStep(3, 7, { step: 3, data: { recommendation_letter: null, certificates: [] } }, store);
    expect(isComplete(complete)).toBe(true);
  });

  it('reports progress with the reward id as fallback', async () => {
    expect(draftProgress(null, 7)).toEqual({
      step1_completed: false,
      step2_completed: false,
      step3_completed: false,
      current_step: 1,
      reward_id: 7,
    });

    const draft = await saveStep(3, 7, { step: 1, data: step1 }, store);
    expect(draftProgress(draft, 7)).toMatchObject({ step1_completed: true, current_step: 1 });
  });

  it('collects every staged file of step 3', () => {
    const letter = { original_name: 'letter.pdf', file_path: 'temp_uploads/a.pdf', file_size: 10 };
    const certificate = { original_name: 'cert.png', file_path: 'temp_uploads/b.png', file_size: 20 };

    expect(stagedFiles(undefined)).toEqual([]);
    expect(stagedFiles({ recommendation_letter: letter, certificates: [certificate] })).toEqual([letter, certificate]);
    expect(stagedFiles({ recommendation_letter: null, certificates: [certificate] })).toEqual([certificate]);
  });
});
