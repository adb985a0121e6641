export type NoticeTone = "info" | "success" | "error";

export interface NoticeState {
  tone: NoticeTone;
  text: string;
}

export default function Notice({ notice }: { notice: NoticeState | null }) {
  if (!notice) return null;
  return (
    <div className={`notice notice--${notice.tone}`} role={notice.tone === "error" ? "alert" : "status"}>
      {notice.text}
    </div>
  );
}
