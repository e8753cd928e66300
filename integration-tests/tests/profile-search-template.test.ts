/**
 * Profile Search Prompt Tests
 */

import { PLATFORM_FOCUS, buildProfileSearchPrompt } from '@riskline/shared';

describe('Profile Search Prompt', () => {
  it('should name the platform and identifier on the first line', () => {
    const prompt = buildProfileSearchPrompt('linkedin', 'linkedin.com/in/jordan');

    expect(prompt.split('\n')[0]).toBe('Review the public LinkedIn profile at: linkedin.com/in/jordan');
  });

  it('should list the focus signals of the platform as bullets', () => {
    const prompt = buildProfileSearchPrompt('facebook', 'facebook.com/jordan');

    for (const signal of PLATFORM_FOCUS.facebook.signals) {
      expect(prompt).toContain(`\n- ${signal}`);
    }
  });

  it.each(['x.com/$`', "x.com/$'", 'x.com/$&', 'x.com/$$1'])(
    'should insert identifier %s verbatim',
    (identifier) => {
      const prompt = buildProfileSearchPrompt('linkedin', identifier);

      expect(prompt.split('\n')[0]).toBe(`Review the public LinkedIn profile at: ${identifier}`);
    }
  );
});
