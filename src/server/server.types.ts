export interface ServerStats {
  userCount: number;
  userCountDelta: number;
  anonCount: number;
  totalAccounts: number;
  rankedCount: number;
  recordCount: number;
  gamesPlayed: number;
  gamesPlayedDelta: number;
  gamesFinished: number;
  /** 초 단위 누적 플레이 시간 */
  gameTime: number;
  inputs: number;
  piecesPlaced: number;
}

export interface ServerActivity {
  /** 최근 2일간 분 단위 접속자 수 */
  activity: number[];
}
