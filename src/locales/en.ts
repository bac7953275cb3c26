export const en = {
  // client.ts printHelp
  client_help_title:  "memoria-ui — clipboard history client",
  client_help_usage:  "Usage:",
  client_interactive: "Enter interactive shell",
  client_lang:        "Change language (en/ko)",
  // shared command help (client.ts & shell.ts)
  cmd_list:     "Recent items",
  cmd_starred:  "Starred items only",
  cmd_search:   "Search items",
  cmd_gallery:  "Image items",
  cmd_star:     "Star an item",
  cmd_unstar:   "Remove star",
  cmd_copy:     "Copy item to clipboard",
  cmd_delete:   "Delete items by id",
  cmd_purge:    "Delete everything except starred items",
  cmd_settings: "Show daemon settings",
  // results
  result_no_items:   "No items.",
  result_starred:    "Star updated.",
  result_copied:     "Copied to clipboard.",
  result_deleted:    "Deleted",
  result_items_unit: "items",
  result_images_unit: "images",
  result_image:      "[image]",
  result_untitled:   "(empty)",
  settings_header:   "── memoria settings ──",
  // shell.ts
  welcome_subtitle:     " — clipboard history shell",
  welcome_hint:         "Commands: list | search <text> | copy <id> | help | exit",
  shell_connected:      "Connected to daemon.",
  shell_disconnected:   "Disconnected from daemon. Type 'connect' to retry.",
  shell_not_connected:  "Not connected. Type 'connect' to retry.",
  shell_unknown_command: "Unknown command",
  shell_confirm_purge:  "  Delete all unstarred items? [y/N] ",
  shell_cancelled:      "Cancelled.",
  help_header:          "── memoria shell ──",
  help_connect:         "Reconnect to the daemon",
  help_lang:            "Change language (en/ko)",
  help_exit:            "Exit shell",
  // usage errors
  usage_expected_id:    "Expected a numeric item id",
  usage_expected_query: "Expected search text",
  usage_expected_limit: "Expected a positive limit",
  // lang messages
  lang_set_to:    "Language set to",
  lang_unknown:   "Unknown language",
  lang_available: "Available",
  lang_save_failed: "Could not save language preference",
} as const;

export type Translations = { [K in keyof typeof en]: string };
