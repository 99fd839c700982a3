export interface ScoreRules {
  startingLives: number
  asteroidPoints: number
  enemyPoints: number
}

/**
 * Points and remaining extra lives for a session
 */
export class ScoreTracker {
  private rules: ScoreRules
  private score: number = 0
  private lives: number

  constructor(rules: ScoreRules) {
    this.rules = rules
    this.lives = rules.startingLives
  }

  getScore(): number {
    return this.score
  }

  getLives(): number {
    return this.lives
  }

  hasLivesLeft(): boolean {
    return this.lives > 0
  }

  /**
   * Points earned for destroying these counts of asteroids and enemies
   */
  pointsFor(asteroidsHit: number, enemiesHit: number): number {
    return this.rules.asteroidPoints * asteroidsHit + this.rules.enemyPoints * enemiesHit
  }

  /**
   * Credit one frame's hits. Returns the points gained.
   */
  addHits(hits: { asteroidsHit: number; enemiesHit: number }): number {
    const points = this.pointsFor(hits.asteroidsHit, hits.enemiesHit)
    this.score += points
    return points
  }

  /**
   * Spend one extra life. Throws when none are left.
   */
  loseLife(): number {
    if (this.lives <= 0) {
      throw new Error('No extra lives left to spend')
    }
    return --this.lives
  }

  setScore(score: number): void {
    if (!Number.isFinite(score) || score < 0) {
      throw new Error(`Score must be a non-negative number, got ${score}`)
    }
    this.score = score
  }

  resetLives(): void {
    this.lives = this.rules.startingLives
  }

  reset(): void {
    this.score = 0
    this.resetLives()
  }
}
