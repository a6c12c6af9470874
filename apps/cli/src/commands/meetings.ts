import type { Command } from 'commander';
import { MinutesInputSchema } from '@persona-desk/modules';
import { InputFileError, formatIssues } from '@persona-desk/runtime';
import type { CliContext } from '../context';
import { parseCsv, parseMinutes, readJsonFile } from '../input';
import { bullets, section } from '../ui';

export function registerMeetingCommands(program: Command, ctx: CliContext): void {
  program
    .command('meeting')
    .description('会議の進行プランを作成')
    .argument('<type>', '会議の種類 (kickoff, review, planning など)')
    .argument('<agenda>', 'アジェンダ（カンマ区切り）')
    .argument('<participants>', '参加者（カンマ区切り）')
    .option('-d, --duration <minutes>', '会議時間（分）', parseMinutes)
    .action(async (meetingType: string, agenda: string, participants: string, options: { duration?: number }) => {
      ctx.io.out('会議進行プランを作成中...');

      const plan = await ctx
        .agent()
        .facilitateMeeting(meetingType, parseCsv(agenda), parseCsv(participants), options.duration);

      const schedule = plan.schedule.map((slot) => `${slot.start_time}-${slot.end_time}  ${slot.item}（${slot.duration_minutes}分）`);
      ctx.io.out(section(`🗓️ タイムスケジュール（${plan.duration_minutes}分）`, bullets(schedule)));
      ctx.io.out(section(`🎯 ${plan.meeting_type} 進行プラン`, plan.facilitation_plan));
      ctx.io.out(`保存先: ${plan.record_path}`);
    });

  program
    .command('one-on-one')
    .description('1on1 の進行プランを作成')
    .argument('<participant>', '参加者名')
    .option('-t, --topics <topics>', 'トピック（カンマ区切り）')
    .action(async (participant: string, options: { topics?: string }) => {
      ctx.io.out(`1on1 進行プランを作成中: ${participant}`);

      const topics = parseCsv(options.topics);
      const plan = await ctx.agent().conductOneOnOne(participant, topics.length > 0 ? topics : undefined);
      ctx.io.out(section(`👥 ${participant}さんとの1on1`, plan.session_plan));
      ctx.io.out(`保存先: ${plan.record_path}`);
    });

  program
    .command('minutes')
    .description('会議情報ファイルから議事録を作成')
    .argument('<meeting-file>', '会議情報ファイル (JSON)')
    .action(async (meetingFile: string) => {
      const parsed = MinutesInputSchema.safeParse(readJsonFile(meetingFile, ctx.cwd));
      if (!parsed.success) {
        throw new InputFileError(meetingFile, formatIssues(parsed.error.issues).join('; '));
      }

      const { meeting_info, discussion_points, decisions, action_items } = parsed.data;
      const minutes = await ctx.agent().generateMeetingMinutes(meeting_info, discussion_points, decisions, action_items);
      ctx.io.out(section('📝 議事録', minutes));
    });
}
