/**
 * Judge Evaluation Prompt
 *
 * Forms are written in Indonesian, so the evaluation criteria are too. The
 * expected JSON shape mirrors docs/contracts/judge_verdict.schema.json.
 */

import type { ValidationSettings } from '../config';
import type { JudgeInput } from './types';

export const JUDGE_SYSTEM_PROMPT =
  'Anda adalah seorang AI Judge yang bertugas mengevaluasi dokumen permohonan VPN. ' +
  'Jawab hanya dengan JSON yang valid.';

export function buildEvaluationPrompt(
  input: JudgeInput,
  settings: Pick<ValidationSettings, 'minSignatures' | 'requiredEmailDomain'>
): string {
  const { minSignatures, requiredEmailDomain } = settings;

  return `Tugas Anda adalah menganalisis data yang diekstrak dari PDF dan memberikan keputusan final.

DATA YANG DIEKSTRAK:
${JSON.stringify(input, null, 2)}

KRITERIA EVALUASI:
1. KELENGKAPAN DATA:
   - NIK harus diisi dan berupa angka
   - Nama lengkap, nomor telepon, departemen dan manager/atasan harus diisi
   - Email harus diisi dan menggunakan domain ${requiredEmailDomain}
   - Range Tanggal dan Range Waktu harus diisi dengan format yang benar
   - Approved by dan User VPN harus diisi

2. VALIDASI TANDA TANGAN:
   - Dokumen harus memiliki minimal ${minSignatures} tanda tangan
   - Tanda tangan harus dari: pemohon, atasan, dan pihak IT
   - Jumlah tanda tangan saat ini: ${input.signature_count}

3. JENIS DOKUMEN:
   - Tipe dokumen terdeteksi: ${input.document_type}
   - Pastikan dokumen adalah permohonan VPN baru atau perpanjangan VPN

4. KONSISTENSI DATA:
   - Nama di form harus konsisten dengan User VPN
   - Tanggal dan waktu harus logis
   - Hasil pemeriksaan aturan (rule_issues) harus dipertimbangkan

Berikan evaluasi dalam format JSON dengan struktur berikut:
{
  "is_valid": boolean,
  "status": "approved_for_processing" atau "rejected_with_reason",
  "confidence": float (0.0 - 1.0),
  "issues": [daftar masalah],
  "reasoning": "penjelasan singkat keputusan",
  "missing_fields": [daftar field yang kosong],
  "signature_analysis": { "count": number, "sufficient": boolean, "description": string },
  "document_type_analysis": { "detected_type": string, "confidence": float, "description": string },
  "recommendations": [daftar rekomendasi]
}

PENTING:
- Jika ada field yang kosong atau tidak valid, set is_valid = false
- Jika tanda tangan kurang dari ${minSignatures}, set is_valid = false
- Jika email tidak menggunakan domain ${requiredEmailDomain}, set is_valid = false

Jawab hanya dengan JSON, tanpa teks tambahan.`;
}
