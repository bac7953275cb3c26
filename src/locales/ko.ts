import { type Translations } from "./en.js";

export const ko: Translations = {
  // client.ts printHelp
  client_help_title:  "memoria-ui — 클립보드 기록 클라이언트",
  client_help_usage:  "사용법:",
  client_interactive: "대화형 셸 진입",
  client_lang:        "언어 변경 (en/ko)",
  // shared command help (client.ts & shell.ts)
  cmd_list:     "최근 항목",
  cmd_starred:  "별표 항목만",
  cmd_search:   "항목 검색",
  cmd_gallery:  "이미지 항목",
  cmd_star:     "별표 추가",
  cmd_unstar:   "별표 해제",
  cmd_copy:     "클립보드로 복사",
  cmd_delete:   "id로 항목 삭제",
  cmd_purge:    "별표 항목을 제외하고 모두 삭제",
  cmd_settings: "데몬 설정 보기",
  // results
  result_no_items:   "항목이 없습니다.",
  result_starred:    "별표가 변경되었습니다.",
  result_copied:     "클립보드에 복사했습니다.",
  result_deleted:    "삭제됨",
  result_items_unit: "항목",
  result_images_unit: "이미지",
  result_image:      "[이미지]",
  result_untitled:   "(비어 있음)",
  settings_header:   "── memoria 설정 ──",
  // shell.ts
  welcome_subtitle:     " — 클립보드 기록 셸",
  welcome_hint:         "명령: list | search <텍스트> | copy <id> | help | exit",
  shell_connected:      "데몬에 연결되었습니다.",
  shell_disconnected:   "데몬과 연결이 끊겼습니다. 'connect'로 다시 연결하세요.",
  shell_not_connected:  "연결되어 있지 않습니다. 'connect'로 다시 연결하세요.",
  shell_unknown_command: "알 수 없는 명령",
  shell_confirm_purge:  "  별표 없는 항목을 모두 삭제할까요? [y/N] ",
  shell_cancelled:      "취소했습니다.",
  help_header:          "── memoria 셸 ──",
  help_connect:         "데몬에 다시 연결",
  help_lang:            "언어 변경 (en/ko)",
  help_exit:            "셸 종료",
  // usage errors
  usage_expected_id:    "숫자 항목 id가 필요합니다",
  usage_expected_query: "검색어가 필요합니다",
  usage_expected_limit: "양수 개수가 필요합니다",
  // lang messages
  lang_set_to:    "언어 설정:",
  lang_unknown:   "알 수 없는 언어",
  lang_available: "사용 가능",
  lang_save_failed: "언어 설정을 저장하지 못했습니다",
};
