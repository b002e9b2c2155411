/* --------------------------------------------------------------------------
 *  PatchDrift — Sample diffs shared by tests
 * ----------------------------------------------------------------------- */

/** Replaces `beta` with `BETA` in a three-line file */
export const SIMPLE_DIFF = `--- a/src/app.txt
+++ b/src/app.txt
@@ -1,3 +1,3 @@
 alpha
-beta
+BETA
 gamma
`;

export const MULTI_FILE_DIFF = `diff --git a/one.txt b/one.txt
index 1111111..2222222 100644
--- a/one.txt
+++ b/one.txt
@@ -1,2 +1,2 @@
-first
+FIRST
 second
diff --git a/two.txt b/two.txt
index 3333333..4444444 100644
--- a/two.txt
+++ b/two.txt
@@ -1,2 +1,3 @@
 left
+middle
 right
`;

export const NEW_FILE_DIFF = `diff --git a/docs/notes.md b/docs/notes.md
new file mode 100644
index 0000000..5555555
--- /dev/null
+++ b/docs/notes.md
@@ -0,0 +1,2 @@
+# Notes
+first entry
`;

export const DELETE_FILE_DIFF = `diff --git a/old.txt b/old.txt
deleted file mode 100644
index 6666666..0000000
--- a/old.txt
+++ /dev/null
@@ -1,2 +0,0 @@
-obsolete
-content
`;

export const RENAME_DIFF = `diff --git a/lib/util.txt b/lib/helpers.txt
similarity index 80%
rename from lib/util.txt
rename to lib/helpers.txt
index 7777777..8888888 100644
--- a/lib/util.txt
+++ b/lib/helpers.txt
@@ -1,2 +1,2 @@
 keep
-rename me
+renamed
`;

export const BRACKETED_PATCH = `Some explanation before the patch.
*** Begin Patch
*** Update File: src/app.txt
@@ alpha
 alpha
-beta
+BETA
 gamma
*** End Patch
`;
