/**
 * Team Name Mapper
 *
 * Derives short names and URL slugs from the full franchise names the
 * schedule source publishes ("Dallas Cowboys" -> "Cowboys" -> "cowboys").
 */

export class TeamMapper {
  /**
   * Nickname without the city. Washington's 2020-21 placeholder keeps both words.
   */
  static shortName(teamName: string): string {
    const cleaned = teamName.replace(/\s+/g, ' ').trim();
    if (cleaned.toLowerCase().includes('football team')) {
      return 'Football Team';
    }
    const tokens = cleaned.split(' ');
    return tokens[tokens.length - 1];
  }

  /**
   * Lowercase, hyphenated short name for provider URLs
   */
  static slug(teamName: string): string {
    return TeamMapper.shortName(teamName)
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '');
  }
}
