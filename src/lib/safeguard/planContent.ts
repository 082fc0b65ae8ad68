/**
 * Flatten an assessment subject into text atoms for keyword matching:
 * food names for diet, exercise names and types for exercise.
 */

import type { TextAtom } from './matchers';
import type { AssessmentSubject } from './safeguard.types';

export function extractTextAtoms(subject: AssessmentSubject): TextAtom[] {
  if (subject.planType === 'diet') {
    return subject.items.map((item, index) => ({
      text: item.name,
      path: `items[${index}].name`,
    }));
  }

  const atoms: TextAtom[] = [];
  for (const [key, session] of Object.entries(subject.plan.sessions)) {
    session.exercises.forEach((exercise, index) => {
      const base = `sessions.${key}.exercises[${index}]`;
      atoms.push({ text: exercise.name, path: `${base}.name` });
      atoms.push({ text: exercise.exerciseType, path: `${base}.exerciseType` });
    });
  }
  return atoms;
}
