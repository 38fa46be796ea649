import type { FrameTimestamp, StreamName } from '@framevault/common-types';

/**
 * ディスク上のセグメント
 */
export interface SegmentDescriptor {
  segmentStart: FrameTimestamp;
  fileName: string;
}

/**
 * セグメント内の1エントリ
 */
export interface SegmentEntry {
  /** エントリ名（例: "1718000000123.jpg"） */
  name: string;

  /** ペイロードを読み出す（読まなかったエントリは自動的に読み捨てる） */
  read(): Promise<Buffer>;
}

/**
 * スキャン継続の判定
 */
export type SegmentScanDecision = 'continue' | 'stop';

export type SegmentEntryVisitor = (entry: SegmentEntry) => Promise<SegmentScanDecision>;

/**
 * 書き込み中のセグメント
 *
 * Archive Writer だけが保持する
 */
export interface ISegmentWriter {
  readonly segmentStart: FrameTimestamp;

  /**
   * エントリを追記
   */
  appendEntry(name: string, data: Buffer): Promise<void>;

  /**
   * フラッシュしてクローズ（2回目以降は最初の結果を返す）
   */
  close(): Promise<void>;
}

/**
 * Segment Repository Interface
 *
 * アーカイブセグメントの永続化を抽象化
 * 実装: LocalFileSystemSegmentRepository
 *
 * Storage Structure:
 * - /{basePath}/{streamName}/{streamName}_{segmentStart}.tar
 */
export interface ISegmentRepository {
  /**
   * ストリームのセグメントディレクトリを破棄して作り直す
   * @param streamName Stream name
   */
  resetStream(streamName: StreamName): Promise<void>;

  /**
   * 新しいセグメントを作成
   * 作成に失敗した場合は SegmentCreationError
   * @param streamName Stream name
   * @param segmentStart 最初のフレームの時刻
   */
  createSegment(streamName: StreamName, segmentStart: FrameTimestamp): Promise<ISegmentWriter>;

  /**
   * ストリームの全セグメントを開始時刻の昇順で取得
   * ディレクトリが存在しない場合は空配列
   * @param streamName Stream name
   */
  listSegments(streamName: StreamName): Promise<SegmentDescriptor[]>;

  /**
   * セグメントのエントリを格納順に走査
   * visitor が 'stop' を返した時点で走査を終了する
   * 読み取りエラーは StorageAccessError
   * @param streamName Stream name
   * @param segment listSegments で取得したセグメント
   * @param visitor エントリごとに呼ばれるコールバック
   */
  scanSegment(
    streamName: StreamName,
    segment: SegmentDescriptor,
    visitor: SegmentEntryVisitor
  ): Promise<void>;
}
