import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { AllowedEmail } from "@/types";
import { ValidationError } from "@/lib/errors";
import { runQuery } from "@/lib/supabase";
import { parseRows } from "@/store/rows";
import { canonicalEmail } from "@/lib/auth/session";

const allowedEmailRow = z
  .object({
    email: z.string(),
    created_at: z.string().nullish(),
    created_by: z.string().nullish(),
  })
  .transform((r): AllowedEmail => ({ email: r.email, createdAt: r.created_at ?? null, createdBy: r.created_by ?? null }));

function requireEmail(raw: string): string {
  const email = canonicalEmail(raw);
  if (!email) throw new ValidationError("email", "Escribe un correo.");
  return email;
}

/** Newest first. */
export async function listAllowedEmails(client: SupabaseClient): Promise<AllowedEmail[]> {
  const data = await runQuery(
    "allowList.list",
    client.from("allowed_emails").select("email, created_at, created_by").order("created_at", { ascending: false })
  );
  return parseRows("allowList.list", allowedEmailRow, data);
}

export async function addAllowedEmail(client: SupabaseClient, rawEmail: string, createdBy: string | null): Promise<void> {
  const email = requireEmail(rawEmail);
  await runQuery("allowList.add", client.from("allowed_emails").upsert({ email, created_by: createdBy }));
}

export async function removeAllowedEmail(client: SupabaseClient, rawEmail: string): Promise<void> {
  const email = requireEmail(rawEmail);
  await runQuery("allowList.remove", client.from("allowed_emails").delete().eq("email", email));
}
